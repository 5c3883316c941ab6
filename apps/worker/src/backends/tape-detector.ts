import { basename } from 'node:path';
import { z } from 'zod';
import { logger } from '@reelqueue/shared';
import type { WorkerConfig } from '../config';
import { attemptSignal } from './backend.types';
import type { ProcessRunner } from './process-runner';

export const TAPE_TYPES = ['VHS', 'MINIDV', 'HI8', 'BETAMAX', 'DIGITAL8', 'SUPER8'] as const;

export type TapeType = (typeof TAPE_TYPES)[number];

export const FALLBACK_TAPE_TYPE: TapeType = 'VHS';

/** A job whose tape_type is absent or `auto` has it detected before the run. */
export const AUTO_TAPE_TYPE = 'auto';

export function needsDetection(tapeType: string | undefined): boolean {
  return tapeType === undefined || tapeType.toLowerCase() === AUTO_TAPE_TYPE;
}

type TapeSignature = {
  resolutions: Array<[number, number]>;
  frameRates: number[];
  interlaced: boolean;
  /** kbit/s */
  bitrate: [number, number];
  audioStreams: number[];
};

const SIGNATURES: Record<TapeType, TapeSignature> = {
  VHS: {
    resolutions: [[720, 480], [720, 576], [352, 240], [352, 288]],
    frameRates: [29.97, 25, 23.976],
    interlaced: true,
    bitrate: [1_000, 8_000],
    audioStreams: [1, 2],
  },
  MINIDV: {
    resolutions: [[720, 480], [720, 576]],
    frameRates: [29.97, 25],
    interlaced: true,
    bitrate: [25_000, 25_000],
    audioStreams: [2],
  },
  HI8: {
    resolutions: [[720, 480], [720, 576], [352, 240]],
    frameRates: [29.97, 25],
    interlaced: true,
    bitrate: [2_000, 10_000],
    audioStreams: [1, 2],
  },
  BETAMAX: {
    resolutions: [[720, 480], [720, 576]],
    frameRates: [29.97, 25],
    interlaced: true,
    bitrate: [3_000, 12_000],
    audioStreams: [1, 2],
  },
  DIGITAL8: {
    resolutions: [[720, 480], [720, 576]],
    frameRates: [29.97, 25],
    interlaced: true,
    bitrate: [25_000, 25_000],
    audioStreams: [2],
  },
  SUPER8: {
    resolutions: [[1440, 1080], [1920, 1080], [720, 480]],
    frameRates: [18, 24, 29.97],
    interlaced: false,
    bitrate: [5_000, 20_000],
    audioStreams: [0, 1, 2],
  },
};

const FILENAME_HINTS: Array<[RegExp, TapeType]> = [
  [/vhs|vcr/, 'VHS'],
  [/minidv|mini.?dv|dv/, 'MINIDV'],
  [/hi.?8|8mm(?!.*digital)/, 'HI8'],
  [/beta(max)?/, 'BETAMAX'],
  [/digital.?8|d8/, 'DIGITAL8'],
  [/super.?8|s8/, 'SUPER8'],
];

const MAX_SCORE = 9.5;
const FILENAME_BOOST = 0.5;
const INTERLACED_FIELD_ORDERS = ['tt', 'bb', 'tb', 'bt'];

const ffprobeSchema = z.object({
  streams: z
    .array(
      z.object({
        codec_type: z.string().optional(),
        width: z.number().optional(),
        height: z.number().optional(),
        r_frame_rate: z.string().optional(),
        field_order: z.string().optional(),
        bit_rate: z.string().optional(),
      }),
    )
    .default([]),
});

export type VideoMetadata = {
  width: number;
  height: number;
  frameRate: number | null;
  interlaced: boolean;
  bitrateKbps: number;
  audioStreams: number;
};

export type TapeDetection = {
  tapeType: TapeType;
  confidence: number;
  method: 'metadata' | 'filename' | 'fallback';
};

export interface TapeTypeDetector {
  /** Never rejects; falls back to the file name, then to VHS. */
  detect(sourcePath: string, signal?: AbortSignal): Promise<TapeDetection>;
}

export function parseFrameRate(value: string | undefined): number | null {
  if (!value) return null;
  const parts = value.split('/').map(Number);
  const rate = parts.length === 2 ? parts[0] / parts[1] : parts[0];
  return Number.isFinite(rate) ? Math.round(rate * 1000) / 1000 : null;
}

export function filenameHint(sourcePath: string): TapeType | undefined {
  const name = basename(sourcePath).toLowerCase();
  return FILENAME_HINTS.find(([pattern]) => pattern.test(name))?.[1];
}

/** Share of each signature the metadata matches, between 0 and 1. */
export function scoreMetadata(metadata: VideoMetadata): Record<TapeType, number> {
  const scores: Record<TapeType, number> = {
    VHS: 0,
    MINIDV: 0,
    HI8: 0,
    BETAMAX: 0,
    DIGITAL8: 0,
    SUPER8: 0,
  };
  for (const tapeType of TAPE_TYPES) {
    const signature = SIGNATURES[tapeType];
    let score = 0;

    if (signature.resolutions.some(([w, h]) => w === metadata.width && h === metadata.height)) {
      score += 3;
    } else if (
      signature.resolutions.some(
        ([w, h]) => Math.abs(w - metadata.width) < 50 && Math.abs(h - metadata.height) < 50,
      )
    ) {
      score += 1.5;
    }

    const { frameRate } = metadata;
    if (frameRate !== null) {
      if (signature.frameRates.some((fps) => Math.abs(frameRate - fps) < 0.5)) {
        score += 2;
      } else if (signature.frameRates.some((fps) => Math.abs(frameRate - fps) < 2)) {
        score += 1;
      }
    }

    if (metadata.interlaced === signature.interlaced) {
      score += 2;
    }

    const [min, max] = signature.bitrate;
    const kbps = metadata.bitrateKbps;
    if (kbps > 0) {
      if (kbps >= min && kbps <= max) {
        score += 1.5;
      } else if (kbps < min * 2 && kbps > min * 0.5) {
        score += 0.75;
      }
    }

    if (signature.audioStreams.includes(metadata.audioStreams)) {
      score += 1;
    }

    scores[tapeType] = score / MAX_SCORE;
  }
  return scores;
}

/**
 * Guesses the source tape format of a capture from its ffprobe metadata,
 * nudged by format names in the file name.
 */
export class TapeDetector implements TapeTypeDetector {
  constructor(
    private readonly runner: ProcessRunner,
    private readonly settings: WorkerConfig['tapeDetection'],
  ) {}

  async detect(sourcePath: string, signal?: AbortSignal): Promise<TapeDetection> {
    const hint = filenameHint(sourcePath);
    const metadata = await this.probe(sourcePath, signal);
    if (!metadata) {
      return hint
        ? { tapeType: hint, confidence: FILENAME_BOOST, method: 'filename' }
        : { tapeType: FALLBACK_TAPE_TYPE, confidence: 0, method: 'fallback' };
    }

    const scores = scoreMetadata(metadata);
    if (hint) {
      scores[hint] += FILENAME_BOOST;
    }
    let best: TapeType = TAPE_TYPES[0];
    for (const tapeType of TAPE_TYPES) {
      if (scores[tapeType] > scores[best]) best = tapeType;
    }
    return { tapeType: best, confidence: Math.round(scores[best] * 100) / 100, method: 'metadata' };
  }

  private async probe(sourcePath: string, signal?: AbortSignal): Promise<VideoMetadata | null> {
    const stdout: string[] = [];
    const outcome = await this.runner.run(
      this.settings.probePath,
      ['-v', 'quiet', '-print_format', 'json', '-show_format', '-show_streams', sourcePath],
      {
        signal: attemptSignal(this.settings.timeoutMs, signal).signal,
        onStdoutLine: (line) => stdout.push(line),
      },
    );
    const log = { service: 'worker', source_path: sourcePath };
    if (outcome.spawnError || outcome.aborted || outcome.exitCode !== 0) {
      logger.warn(
        { ...log, exit_code: outcome.exitCode, error: outcome.spawnError, aborted: outcome.aborted },
        'ffprobe failed, tape type not detected from metadata',
      );
      return null;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(stdout.join('\n'));
    } catch (error) {
      logger.warn({ ...log, error }, 'ffprobe returned unreadable output');
      return null;
    }
    const parsed = ffprobeSchema.safeParse(raw);
    if (!parsed.success) {
      logger.warn({ ...log, issues: parsed.error.issues }, 'ffprobe output has an unexpected shape');
      return null;
    }

    const { streams } = parsed.data;
    const video = streams.find((stream) => stream.codec_type === 'video');
    if (!video) {
      logger.warn(log, 'no video stream found');
      return null;
    }
    return {
      width: video.width ?? 0,
      height: video.height ?? 0,
      frameRate: parseFrameRate(video.r_frame_rate),
      interlaced: INTERLACED_FIELD_ORDERS.includes(video.field_order ?? 'progressive'),
      bitrateKbps: video.bit_rate ? Math.floor(Number(video.bit_rate) / 1000) || 0 : 0,
      audioStreams: streams.filter((stream) => stream.codec_type === 'audio').length,
    };
  }
}
