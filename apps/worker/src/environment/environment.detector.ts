import { logger } from '@reelqueue/shared';
import type { WorkerConfig } from '../config';
import { median } from './environment-probes';
import type {
  AccelerationPath,
  EnvironmentProbes,
  EnvironmentProfile,
  ProbeName,
} from './environment.types';

export type DetectorSettings = WorkerConfig['environment'];

export function timeoutMultiplierFor(
  latencyMs: number,
  settings: Pick<DetectorSettings, 'latencyBaselineMs' | 'latencyScaleMs' | 'maxTimeoutMultiplier'>,
): number {
  const excess = Math.max(0, latencyMs - settings.latencyBaselineMs);
  const raw = 1 + excess / settings.latencyScaleMs;
  return Math.min(settings.maxTimeoutMultiplier, Math.max(1, raw));
}

export function concurrencyFor(
  conditions: { virtualized: boolean; latencyMs: number; virtualizationUnknown: boolean },
  settings: Pick<
    DetectorSettings,
    'concurrencyOverride' | 'bareMetalMaxConcurrency' | 'highLatencyMs'
  >,
): number {
  if (settings.concurrencyOverride !== undefined) {
    return settings.concurrencyOverride;
  }
  if (
    conditions.virtualized ||
    conditions.virtualizationUnknown ||
    conditions.latencyMs > settings.highLatencyMs
  ) {
    return 1;
  }
  return settings.bareMetalMaxConcurrency;
}

/**
 * Builds EnvironmentProfile snapshots from the raw probes. Probe failures
 * never escape: each one degrades to its conservative default and is listed
 * in `fallbacks`.
 */
export class EnvironmentDetector {
  constructor(
    private readonly probes: EnvironmentProbes,
    private readonly settings: DetectorSettings,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async detect(): Promise<EnvironmentProfile> {
    const fallbacks: ProbeName[] = [];

    let virtualized: boolean;
    let virtualizationUnknown = false;
    if (this.settings.override) {
      virtualized = this.settings.override === 'virtualized';
    } else {
      try {
        virtualized = await this.probes.detectVirtualization();
      } catch (error) {
        logger.warn({ service: 'worker', error }, 'virtualization probe failed');
        virtualized = false;
        virtualizationUnknown = true;
        fallbacks.push('virtualization');
      }
    }

    let latencyMs: number;
    try {
      latencyMs = await this.measureLatency();
    } catch (error) {
      logger.warn({ service: 'worker', error }, 'latency probe failed');
      latencyMs = this.settings.latencyCeilingMs;
      fallbacks.push('latency');
    }

    let accelerationPaths: AccelerationPath[];
    try {
      accelerationPaths = await this.probes.listAccelerationPaths();
    } catch (error) {
      logger.warn({ service: 'worker', error }, 'acceleration probe failed');
      accelerationPaths = [];
      fallbacks.push('acceleration');
    }

    const profile: EnvironmentProfile = Object.freeze({
      virtualized,
      maxConcurrentJobs: concurrencyFor(
        { virtualized, latencyMs, virtualizationUnknown },
        this.settings,
      ),
      latencyMs,
      accelerationPaths: Object.freeze(accelerationPaths),
      timeoutMultiplier: timeoutMultiplierFor(latencyMs, this.settings),
      detectedAt: this.now(),
      fallbacks: Object.freeze(fallbacks),
    });

    logger.info(
      {
        service: 'worker',
        virtualized: profile.virtualized,
        max_concurrent_jobs: profile.maxConcurrentJobs,
        latency_ms: profile.latencyMs,
        acceleration: profile.accelerationPaths,
        timeout_multiplier: profile.timeoutMultiplier,
        fallbacks: profile.fallbacks,
      },
      'environment detected',
    );
    return profile;
  }

  /**
   * Re-samples latency only. Returns `previous` unchanged unless the latency
   * moved beyond the deviation threshold, in which case the whole profile is
   * detected again.
   */
  async refresh(previous: EnvironmentProfile): Promise<EnvironmentProfile> {
    let latencyMs: number;
    try {
      latencyMs = await this.measureLatency();
    } catch (error) {
      logger.warn({ service: 'worker', error }, 'latency probe failed');
      latencyMs = this.settings.latencyCeilingMs;
    }

    const threshold = Math.max(
      this.settings.deviationMs,
      this.settings.deviationRatio * previous.latencyMs,
    );
    if (Math.abs(latencyMs - previous.latencyMs) <= threshold) {
      return previous;
    }

    logger.info(
      { service: 'worker', previous_latency_ms: previous.latencyMs, latency_ms: latencyMs },
      'latency shifted, re-detecting environment',
    );
    return this.detect();
  }

  private async measureLatency(): Promise<number> {
    const samples: number[] = [];
    let lastError: unknown;
    for (let i = 0; i < this.settings.probeSamples; i += 1) {
      try {
        samples.push(await this.probes.sampleLatency());
      } catch (error) {
        lastError = error;
      }
    }
    if (samples.length === 0) {
      throw lastError instanceof Error ? lastError : new Error('no latency samples');
    }
    return median(samples);
  }
}
