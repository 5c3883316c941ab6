import { mkdir } from 'node:fs/promises';
import { basename, extname, join } from 'node:path';
import { z } from 'zod';
import { logger } from '@reelqueue/shared';
import type { WorkerConfig } from '../config';
import type {
  AccelerationPath,
  EnvironmentProfile,
  ProfileSource,
} from '../environment/environment.types';
import type { Job } from '../jobs/job.types';
import {
  BackendAdapter,
  BackendResult,
  attemptSignal,
  failed,
} from './backend.types';
import { StderrSignature, classifyExit } from './exit-classifier';
import type { ProcessRunner } from './process-runner';
import { TapeTypeDetector, needsDetection } from './tape-detector';

const transcoderParamsSchema = z.object({
  tape_type: z.string().trim().min(1).optional(),
  video_codec: z.string().trim().min(1).optional(),
  crf: z.number().int().min(0).max(51).default(18),
  audio_bitrate: z.string().regex(/^\d+k$/).default('192k'),
  output_name: z
    .string()
    .regex(/^[\w.-]+$/, 'must be a plain file name')
    .optional(),
});

export type TranscoderParams = z.infer<typeof transcoderParamsSchema>;

const HARDWARE_PATHS: Record<AccelerationPath, { hwaccel: string[]; encoder: string }> = {
  nvenc: { hwaccel: ['-hwaccel', 'cuda'], encoder: 'h264_nvenc' },
  qsv: { hwaccel: ['-hwaccel', 'qsv'], encoder: 'h264_qsv' },
  amf: { hwaccel: ['-hwaccel', 'd3d11va'], encoder: 'h264_amf' },
  vaapi: { hwaccel: ['-hwaccel', 'vaapi'], encoder: 'h264_vaapi' },
  videotoolbox: { hwaccel: ['-hwaccel', 'videotoolbox'], encoder: 'h264_videotoolbox' },
};

const INTERLACED_TAPES = ['VHS', 'BETAMAX', 'HI8'];
const NOISY_TAPES = ['VHS'];

export const TRANSCODER_SIGNATURES: readonly StderrSignature[] = [
  { pattern: /invalid data found when processing input/i, type: 'fatal_input', reason: 'corrupt_input' },
  { pattern: /moov atom not found/i, type: 'fatal_input', reason: 'corrupt_input' },
  { pattern: /could not find codec parameters/i, type: 'fatal_input', reason: 'corrupt_input' },
  { pattern: /no such file or directory/i, type: 'fatal_input', reason: 'missing_input' },
  { pattern: /(unknown|unsupported) (codec|decoder)|decoder .* not found/i, type: 'fatal_input', reason: 'unsupported_codec' },
  { pattern: /cannot load nvcuda|no nvenc capable devices|openencodesessionex failed/i, type: 'transient', reason: 'gpu_unavailable' },
  { pattern: /out of memory|cannot allocate memory|resource temporarily unavailable/i, type: 'transient', reason: 'resource_exhausted' },
  { pattern: /connection (reset|refused|timed out)|network is unreachable|i\/o error/i, type: 'transient', reason: 'network_error' },
];

/**
 * Builds the ffmpeg command line for one job. Hardware encoding follows the
 * profile's preferred acceleration path unless the job pins a codec.
 */
export function buildTranscodeArgs(
  sourcePath: string,
  outputPath: string,
  params: TranscoderParams,
  profile: Pick<EnvironmentProfile, 'accelerationPaths' | 'virtualized'>,
): string[] {
  const hardware =
    params.video_codec === undefined && profile.accelerationPaths.length > 0
      ? HARDWARE_PATHS[profile.accelerationPaths[0]]
      : undefined;
  const encoder = params.video_codec ?? hardware?.encoder ?? 'libx264';

  const args = ['-hide_banner', '-nostats', '-y', ...(hardware?.hwaccel ?? []), '-i', sourcePath];
  args.push('-c:v', encoder);
  if (encoder === 'libx264' || encoder === 'h264_nvenc') {
    args.push('-preset', 'medium');
  }
  args.push('-crf', String(params.crf), '-c:a', 'aac', '-b:a', params.audio_bitrate);

  const tape = params.tape_type?.toUpperCase();
  const filters: string[] = [];
  if (tape && INTERLACED_TAPES.includes(tape)) filters.push('yadif=0:0:0');
  if (tape && NOISY_TAPES.includes(tape)) filters.push('hqdn3d=4:3:6:4.5');
  if (filters.length > 0) {
    args.push('-vf', filters.join(','));
  }

  // Keep headroom for the remote-desktop stream on virtualized hosts.
  if (profile.virtualized) {
    args.push('-threads', '4');
  }

  args.push('-progress', 'pipe:1', outputPath);
  return args;
}

export class TranscoderAdapter implements BackendAdapter {
  readonly kind = 'transcoder' as const;

  constructor(
    private readonly runner: ProcessRunner,
    private readonly profiles: ProfileSource,
    private readonly detector: TapeTypeDetector,
    private readonly settings: WorkerConfig['transcoder'] & { outputDir: string },
  ) {}

  async submit(job: Job, timeoutMs: number, signal?: AbortSignal): Promise<BackendResult> {
    const startedAt = Date.now();
    const elapsed = () => Date.now() - startedAt;

    const parsed = transcoderParamsSchema.safeParse(job.params);
    if (!parsed.success) {
      return failed('fatal_input', 'invalid_params', parsed.error.issues[0].message, elapsed());
    }
    const params = parsed.data;

    const outputName =
      params.output_name ?? `${job.id}-${basename(job.source_path, extname(job.source_path))}.mp4`;
    const outputPath = join(this.settings.outputDir, outputName);
    try {
      await mkdir(this.settings.outputDir, { recursive: true });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return failed('transient', 'output_unavailable', message, elapsed());
    }

    const attempt = attemptSignal(timeoutMs, signal);
    let detectedTapeType: string | undefined;
    if (needsDetection(params.tape_type)) {
      const detection = await this.detector.detect(job.source_path, attempt.signal);
      detectedTapeType = detection.tapeType;
      logger.info(
        { service: 'worker', job_id: job.id, backend: this.kind, ...detection },
        'tape type detected',
      );
    }

    const result = await this.transcode(
      job,
      outputPath,
      { ...params, tape_type: detectedTapeType ?? params.tape_type },
      attempt,
      timeoutMs,
      elapsed,
    );
    return detectedTapeType ? { ...result, detectedTapeType } : result;
  }

  private async transcode(
    job: Job,
    outputPath: string,
    params: TranscoderParams,
    attempt: ReturnType<typeof attemptSignal>,
    timeoutMs: number,
    elapsed: () => number,
  ): Promise<BackendResult> {
    const args = buildTranscodeArgs(job.source_path, outputPath, params, this.profiles.current());
    let progressMs = 0;

    const outcome = await this.runner.run(this.settings.path, args, {
      signal: attempt.signal,
      killSignal: 'SIGTERM',
      killGraceMs: 10_000,
      onStdoutLine: (line) => {
        const match = /^out_time_ms=(\d+)$/.exec(line.trim());
        if (match) {
          progressMs = Math.floor(Number(match[1]) / 1000);
        } else if (line.startsWith('progress=')) {
          logger.debug(
            { service: 'worker', job_id: job.id, backend: this.kind, progress_ms: progressMs },
            'transcode progress',
          );
        }
      },
    });

    if (outcome.spawnError) {
      return failed('fatal_backend', 'backend_unavailable', outcome.spawnError.message, elapsed());
    }
    if (outcome.aborted) {
      return attempt.timedOut()
        ? failed('transient', 'timeout', `transcode exceeded ${timeoutMs}ms`, elapsed())
        : failed('transient', 'cancelled', 'transcode cancelled by shutdown', elapsed());
    }
    if (outcome.exitCode === 0) {
      return { success: true, artifactRef: outputPath, durationMs: elapsed() };
    }
    const error = classifyExit(outcome, TRANSCODER_SIGNATURES);
    return { success: false, error, durationMs: elapsed() };
  }
}
