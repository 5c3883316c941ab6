import { mkdir } from 'node:fs/promises';
import { basename, extname, join } from 'node:path';
import { z } from 'zod';
import { logger } from '@reelqueue/shared';
import type { WorkerConfig } from '../config';
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
import { DEFAULT_TAPE_TYPE, UPSCALER_MODELS } from './upscaler-models';

const upscalerParamsSchema = z.object({
  tape_type: z.string().trim().min(1).optional(),
  model: z.string().trim().min(1).optional(),
  scale: z.number().int().min(1).max(4).default(2),
  output_name: z
    .string()
    .regex(/^[\w.-]+$/, 'must be a plain file name')
    .optional(),
});

export type UpscalerParams = z.infer<typeof upscalerParamsSchema>;

export const UPSCALER_SIGNATURES: readonly StderrSignature[] = [
  { pattern: /unsupported (input|format|codec)|cannot open input|invalid input/i, type: 'fatal_input', reason: 'unsupported_codec' },
  { pattern: /no such file or directory/i, type: 'fatal_input', reason: 'missing_input' },
  { pattern: /unknown model|model .* not found/i, type: 'fatal_input', reason: 'unknown_model' },
  { pattern: /license|not activated/i, type: 'fatal_backend', reason: 'license_invalid' },
  { pattern: /out of (video )?memory|cuda error|gpu (lost|hang)|device removed/i, type: 'transient', reason: 'gpu_unavailable' },
];

export function buildUpscaleArgs(
  sourcePath: string,
  outputPath: string,
  params: UpscalerParams,
): string[] {
  const tapeType = (params.tape_type ?? DEFAULT_TAPE_TYPE).toUpperCase();
  const preset = UPSCALER_MODELS[tapeType] ?? UPSCALER_MODELS[DEFAULT_TAPE_TYPE];
  const args = [
    '--input', sourcePath,
    '--output', outputPath,
    '--model', params.model ?? preset.model,
    '--scale', String(params.scale),
  ];
  for (const [name, value] of Object.entries(preset.settings)) {
    const flag = `--${name.replace(/_/g, '-')}`;
    if (value === true) {
      args.push(flag);
    } else if (typeof value === 'number') {
      args.push(flag, String(value));
    }
  }
  args.push('--progress', '--overwrite');
  return args;
}

/**
 * Runs the AI enhancement CLI. Enhancement runs for hours, so cancellation
 * is cooperative: SIGINT first, SIGKILL only after a long grace period.
 */
export class AiUpscalerAdapter implements BackendAdapter {
  readonly kind = 'upscaler' as const;

  constructor(
    private readonly runner: ProcessRunner,
    private readonly detector: TapeTypeDetector,
    private readonly settings: WorkerConfig['upscaler'] & { outputDir: string },
  ) {}

  async submit(job: Job, timeoutMs: number, signal?: AbortSignal): Promise<BackendResult> {
    const startedAt = Date.now();
    const elapsed = () => Date.now() - startedAt;

    const parsed = upscalerParamsSchema.safeParse(job.params);
    if (!parsed.success) {
      return failed('fatal_input', 'invalid_params', parsed.error.issues[0].message, elapsed());
    }
    const params = parsed.data;
    const outputName =
      params.output_name ??
      `${job.id}-${basename(job.source_path, extname(job.source_path))}-enhanced.mp4`;
    const outputPath = join(this.settings.outputDir, outputName);
    try {
      await mkdir(this.settings.outputDir, { recursive: true });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return failed('transient', 'output_unavailable', message, elapsed());
    }

    const attempt = attemptSignal(timeoutMs, signal);
    if (!needsDetection(params.tape_type)) {
      return this.enhance(job, outputPath, params, attempt, timeoutMs, elapsed);
    }
    const detection = await this.detector.detect(job.source_path, attempt.signal);
    logger.info(
      { service: 'worker', job_id: job.id, backend: this.kind, ...detection },
      'tape type detected',
    );
    const result = await this.enhance(
      job,
      outputPath,
      { ...params, tape_type: detection.tapeType },
      attempt,
      timeoutMs,
      elapsed,
    );
    return { ...result, detectedTapeType: detection.tapeType };
  }

  private async enhance(
    job: Job,
    outputPath: string,
    params: UpscalerParams,
    attempt: ReturnType<typeof attemptSignal>,
    timeoutMs: number,
    elapsed: () => number,
  ): Promise<BackendResult> {
    const outcome = await this.runner.run(
      this.settings.path,
      buildUpscaleArgs(job.source_path, outputPath, params),
      {
        signal: attempt.signal,
        killSignal: 'SIGINT',
        killGraceMs: this.settings.cancelGraceMs,
      },
    );

    if (outcome.spawnError) {
      return failed('fatal_backend', 'backend_unavailable', outcome.spawnError.message, elapsed());
    }
    if (outcome.aborted) {
      return attempt.timedOut()
        ? failed('transient', 'timeout', `enhancement exceeded ${timeoutMs}ms`, elapsed())
        : failed('transient', 'cancelled', 'enhancement cancelled by shutdown', elapsed());
    }
    if (outcome.exitCode === 0) {
      return { success: true, artifactRef: outputPath, durationMs: elapsed() };
    }
    return { success: false, error: classifyExit(outcome, UPSCALER_SIGNATURES), durationMs: elapsed() };
  }
}
