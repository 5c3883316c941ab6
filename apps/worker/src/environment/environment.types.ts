import type { AccelerationPath } from '../config';

export type { AccelerationPath };

/**
 * Immutable snapshot of detected execution conditions. Published frozen and
 * replaced wholesale on refresh; holders of an old snapshot keep seeing
 * consistent values.
 */
export type EnvironmentProfile = Readonly<{
  virtualized: boolean;
  maxConcurrentJobs: number;
  latencyMs: number;
  accelerationPaths: readonly AccelerationPath[];
  timeoutMultiplier: number;
  detectedAt: Date;
  /** Probes that failed and fell back to their conservative default. */
  fallbacks: readonly ProbeName[];
}>;

export type ProbeName = 'virtualization' | 'latency' | 'acceleration';

/**
 * Raw environment probes. Each may throw; the detector owns the fallbacks.
 */
export interface EnvironmentProbes {
  detectVirtualization(): Promise<boolean>;
  /** One round-trip sample in milliseconds. */
  sampleLatency(): Promise<number>;
  /** Available hardware encode paths, in the configured preference order. */
  listAccelerationPaths(): Promise<AccelerationPath[]>;
}

export interface ProfileSource {
  current(): EnvironmentProfile;
}
