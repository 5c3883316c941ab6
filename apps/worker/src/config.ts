import { z } from 'zod';
import type { BackendKind } from '@reelqueue/shared';
import { ConfigValidationError } from './errors';

const flag = (fallback: boolean) =>
  z.preprocess((val) => {
    if (val === undefined || val === '') {
      return fallback;
    }
    if (typeof val === 'string') {
      const normalized = val.trim().toLowerCase();
      if (['true', '1', 'yes', 'on'].includes(normalized)) return true;
      if (['false', '0', 'no', 'off'].includes(normalized)) return false;
    }
    return val;
  }, z.boolean());

const ms = (fallback: number) => z.coerce.number().int().min(0).default(fallback);

const optionalString = z.preprocess(
  (val) => (val === '' ? undefined : val),
  z.string().trim().min(1).optional(),
);

const accelerationPathSchema = z.enum([
  'nvenc',
  'qsv',
  'amf',
  'vaapi',
  'videotoolbox',
]);

export type AccelerationPath = z.infer<typeof accelerationPathSchema>;

const accelerationOrderSchema = z
  .preprocess(
    (val) =>
      typeof val === 'string'
        ? val
            .split(',')
            .map((s) => s.trim())
            .filter((s) => s.length > 0)
        : val,
    z.array(accelerationPathSchema).min(1),
  )
  .default(['nvenc', 'qsv', 'amf', 'vaapi', 'videotoolbox']);

const envSchema = z.object({
  QUEUE_DRIVER: z.enum(['postgres', 'memory']).default('postgres'),
  DB_APPLY_SCHEMA: flag(false),
  SCHEMA_FILE: z.string().default('db/schema.sql'),
  POLL_INTERVAL_MS: ms(750),
  RETENTION_DAYS: z.coerce.number().int().min(0).default(30),
  RETENTION_SWEEP_MS: ms(3_600_000),

  CONCURRENCY_OVERRIDE: z.coerce.number().int().min(1).optional(),
  BARE_METAL_MAX_CONCURRENCY: z.coerce.number().int().min(1).default(2),
  ENVIRONMENT_OVERRIDE: z.enum(['virtualized', 'bare_metal']).optional(),
  LATENCY_PROBE_HOST: z.string().default('8.8.8.8'),
  LATENCY_PROBE_PORT: z.coerce.number().int().min(1).max(65535).default(53),
  LATENCY_PROBE_SAMPLES: z.coerce.number().int().min(1).default(3),
  LATENCY_PROBE_TIMEOUT_MS: ms(2_000),
  LATENCY_CEILING_MS: ms(1_000),
  LATENCY_BASELINE_MS: ms(50),
  LATENCY_SCALE_MS: z.coerce.number().int().min(1).default(100),
  HIGH_LATENCY_MS: ms(150),
  LATENCY_DEVIATION_MS: ms(40),
  LATENCY_DEVIATION_RATIO: z.coerce.number().min(0).default(0.5),
  MAX_TIMEOUT_MULTIPLIER: z.coerce.number().min(1).default(4),
  PROFILE_REFRESH_MS: ms(60_000),
  ACCELERATION_ORDER: accelerationOrderSchema,

  RETRY_CEILING: z.coerce.number().int().min(0).default(3),
  BACKOFF_BASE_MS: ms(5_000),
  BACKOFF_MAX_MS: ms(300_000),
  BACKOFF_JITTER_RATIO: z.coerce.number().min(0).max(1).default(0.2),
  NOT_READY_BACKOFF_FACTOR: z.coerce.number().min(1).default(2),
  TIMEOUT_ESCALATION_FACTOR: z.coerce.number().min(1).default(1.5),

  TRANSCODER_ENABLED: flag(true),
  TRANSCODER_PATH: z.string().default('ffmpeg'),
  TRANSCODER_TIMEOUT_MS: ms(1_800_000),
  TRANSCODER_TIMEOUT_CEILING_MS: ms(7_200_000),
  TRANSCODER_MAX_CONCURRENCY: z.coerce.number().int().min(1).optional(),
  OUTPUT_DIR: z.string().default('output'),
  TAPE_PROBE_PATH: z.string().default('ffprobe'),
  TAPE_PROBE_TIMEOUT_MS: ms(60_000),

  EDITOR_ENABLED: flag(false),
  EDITOR_BRIDGE_URL: z.string().url().default('http://127.0.0.1:8089'),
  EDITOR_EXECUTABLE: optionalString,
  EDITOR_TIMEOUT_MS: ms(3_600_000),
  EDITOR_TIMEOUT_CEILING_MS: ms(7_200_000),
  EDITOR_MAX_CONCURRENCY: z.coerce.number().int().min(1).default(1),
  EDITOR_RESTART_WAIT_MS: ms(120_000),

  UPSCALER_ENABLED: flag(false),
  UPSCALER_PATH: z.string().default('ffmpeg-topaz'),
  UPSCALER_TIMEOUT_MS: ms(7_200_000),
  UPSCALER_TIMEOUT_CEILING_MS: ms(28_800_000),
  UPSCALER_MAX_CONCURRENCY: z.coerce.number().int().min(1).default(1),
  UPSCALER_CANCEL_GRACE_MS: ms(60_000),

  UPLOAD_ENABLED: flag(false),
  UPLOAD_BUCKET: optionalString,
  UPLOAD_REGION: z.string().default('us-east-1'),
  UPLOAD_ENDPOINT: optionalString,
  UPLOAD_PREFIX: z.string().default('processed/'),
  UPLOAD_ACCESS_KEY_ID: optionalString,
  UPLOAD_SECRET_ACCESS_KEY: optionalString,
  UPLOAD_TIMEOUT_MS: ms(600_000),
  UPLOAD_TIMEOUT_CEILING_MS: ms(3_600_000),
});

export type BackendSettings = {
  enabled: boolean;
  timeoutBaseMs: number;
  timeoutCeilingMs: number;
  maxConcurrency?: number;
};

export type WorkerConfig = {
  queueDriver: 'postgres' | 'memory';
  applySchema: boolean;
  schemaFile: string;
  pollIntervalMs: number;
  retention: { days: number; sweepIntervalMs: number };
  environment: {
    concurrencyOverride?: number;
    bareMetalMaxConcurrency: number;
    override?: 'virtualized' | 'bare_metal';
    probeHost: string;
    probePort: number;
    probeSamples: number;
    probeTimeoutMs: number;
    latencyCeilingMs: number;
    latencyBaselineMs: number;
    latencyScaleMs: number;
    highLatencyMs: number;
    deviationMs: number;
    deviationRatio: number;
    maxTimeoutMultiplier: number;
    refreshIntervalMs: number;
    accelerationOrder: AccelerationPath[];
  };
  retry: {
    ceiling: number;
    backoffBaseMs: number;
    backoffMaxMs: number;
    jitterRatio: number;
    notReadyFactor: number;
    timeoutEscalationFactor: number;
  };
  backends: Record<BackendKind, BackendSettings>;
  outputDir: string;
  transcoder: { path: string };
  tapeDetection: { probePath: string; timeoutMs: number };
  editor: { bridgeUrl: string; executable?: string; restartWaitMs: number };
  upscaler: { path: string; cancelGraceMs: number };
  upload: {
    enabled: boolean;
    bucket?: string;
    region: string;
    endpoint?: string;
    prefix: string;
    credentials?: { accessKeyId: string; secretAccessKey: string };
    timeoutBaseMs: number;
    timeoutCeilingMs: number;
  };
};

/**
 * Reads worker options from the environment.
 * Every option has a default; invalid values fail fast with the offending keys.
 */
export function loadWorkerConfig(
  env: NodeJS.ProcessEnv = process.env,
): WorkerConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigValidationError(
      result.error.issues.map(
        (issue) => `${issue.path.join('.')}: ${issue.message}`,
      ),
    );
  }
  const e = result.data;

  if (e.UPLOAD_ENABLED && !e.UPLOAD_BUCKET) {
    throw new ConfigValidationError([
      'UPLOAD_BUCKET: required when UPLOAD_ENABLED is true',
    ]);
  }

  const credentials =
    e.UPLOAD_ACCESS_KEY_ID && e.UPLOAD_SECRET_ACCESS_KEY
      ? {
          accessKeyId: e.UPLOAD_ACCESS_KEY_ID,
          secretAccessKey: e.UPLOAD_SECRET_ACCESS_KEY,
        }
      : undefined;

  return {
    queueDriver: e.QUEUE_DRIVER,
    applySchema: e.DB_APPLY_SCHEMA,
    schemaFile: e.SCHEMA_FILE,
    pollIntervalMs: e.POLL_INTERVAL_MS,
    retention: { days: e.RETENTION_DAYS, sweepIntervalMs: e.RETENTION_SWEEP_MS },
    environment: {
      concurrencyOverride: e.CONCURRENCY_OVERRIDE,
      bareMetalMaxConcurrency: e.BARE_METAL_MAX_CONCURRENCY,
      override: e.ENVIRONMENT_OVERRIDE,
      probeHost: e.LATENCY_PROBE_HOST,
      probePort: e.LATENCY_PROBE_PORT,
      probeSamples: e.LATENCY_PROBE_SAMPLES,
      probeTimeoutMs: e.LATENCY_PROBE_TIMEOUT_MS,
      latencyCeilingMs: e.LATENCY_CEILING_MS,
      latencyBaselineMs: e.LATENCY_BASELINE_MS,
      latencyScaleMs: e.LATENCY_SCALE_MS,
      highLatencyMs: e.HIGH_LATENCY_MS,
      deviationMs: e.LATENCY_DEVIATION_MS,
      deviationRatio: e.LATENCY_DEVIATION_RATIO,
      maxTimeoutMultiplier: e.MAX_TIMEOUT_MULTIPLIER,
      refreshIntervalMs: e.PROFILE_REFRESH_MS,
      accelerationOrder: e.ACCELERATION_ORDER,
    },
    retry: {
      ceiling: e.RETRY_CEILING,
      backoffBaseMs: e.BACKOFF_BASE_MS,
      backoffMaxMs: e.BACKOFF_MAX_MS,
      jitterRatio: e.BACKOFF_JITTER_RATIO,
      notReadyFactor: e.NOT_READY_BACKOFF_FACTOR,
      timeoutEscalationFactor: e.TIMEOUT_ESCALATION_FACTOR,
    },
    backends: {
      transcoder: {
        enabled: e.TRANSCODER_ENABLED,
        timeoutBaseMs: e.TRANSCODER_TIMEOUT_MS,
        timeoutCeilingMs: e.TRANSCODER_TIMEOUT_CEILING_MS,
        maxConcurrency: e.TRANSCODER_MAX_CONCURRENCY,
      },
      editor: {
        enabled: e.EDITOR_ENABLED,
        timeoutBaseMs: e.EDITOR_TIMEOUT_MS,
        timeoutCeilingMs: e.EDITOR_TIMEOUT_CEILING_MS,
        maxConcurrency: e.EDITOR_MAX_CONCURRENCY,
      },
      upscaler: {
        enabled: e.UPSCALER_ENABLED,
        timeoutBaseMs: e.UPSCALER_TIMEOUT_MS,
        timeoutCeilingMs: e.UPSCALER_TIMEOUT_CEILING_MS,
        maxConcurrency: e.UPSCALER_MAX_CONCURRENCY,
      },
    },
    outputDir: e.OUTPUT_DIR,
    transcoder: { path: e.TRANSCODER_PATH },
    tapeDetection: { probePath: e.TAPE_PROBE_PATH, timeoutMs: e.TAPE_PROBE_TIMEOUT_MS },
    editor: {
      bridgeUrl: e.EDITOR_BRIDGE_URL,
      executable: e.EDITOR_EXECUTABLE,
      restartWaitMs: e.EDITOR_RESTART_WAIT_MS,
    },
    upscaler: {
      path: e.UPSCALER_PATH,
      cancelGraceMs: e.UPSCALER_CANCEL_GRACE_MS,
    },
    upload: {
      enabled: e.UPLOAD_ENABLED,
      bucket: e.UPLOAD_BUCKET,
      region: e.UPLOAD_REGION,
      endpoint: e.UPLOAD_ENDPOINT,
      prefix: e.UPLOAD_PREFIX,
      credentials,
      timeoutBaseMs: e.UPLOAD_TIMEOUT_MS,
      timeoutCeilingMs: e.UPLOAD_TIMEOUT_CEILING_MS,
    },
  };
}
