import type { WorkerConfig } from '../config';
import type { ClassifiedError } from '../backends/backend.types';
import type { EnvironmentProfile } from '../environment/environment.types';
import type { Job } from '../jobs/job.types';

export type RetryPolicySettings = {
  retry: WorkerConfig['retry'];
  backends: WorkerConfig['backends'];
  upload: Pick<WorkerConfig['upload'], 'timeoutBaseMs' | 'timeoutCeilingMs'>;
};

type TimeoutInputs = Pick<Job, 'backend' | 'timeout_ms' | 'failure_reason'>;

/**
 * Pure decisions about how long an attempt may run, whether another attempt
 * is allowed and how long to wait before it. Holds no per-job state; the
 * job row carries the history these decisions read.
 */
export class RetryPolicy {
  constructor(
    private readonly settings: RetryPolicySettings,
    private readonly random: () => number = Math.random,
  ) {}

  /** Highest attempt number a job can ever reach. */
  get maxAttempts(): number {
    return this.settings.retry.ceiling + 1;
  }

  timeoutFor(
    job: TimeoutInputs,
    profile: Pick<EnvironmentProfile, 'timeoutMultiplier'>,
  ): number {
    const backend = this.settings.backends[job.backend];
    let timeout = Math.round(backend.timeoutBaseMs * profile.timeoutMultiplier);

    if (job.failure_reason === 'timeout' && job.timeout_ms !== null) {
      const escalated = Math.round(
        job.timeout_ms * this.settings.retry.timeoutEscalationFactor,
      );
      timeout = Math.max(timeout, escalated);
    }

    return Math.min(timeout, backend.timeoutCeilingMs);
  }

  uploadTimeout(profile: Pick<EnvironmentProfile, 'timeoutMultiplier'>): number {
    const { timeoutBaseMs, timeoutCeilingMs } = this.settings.upload;
    return Math.min(
      Math.round(timeoutBaseMs * profile.timeoutMultiplier),
      timeoutCeilingMs,
    );
  }

  /**
   * `attempt` is the number of the attempt that just failed.
   * A fatal_backend failure earns a single retry over the job's lifetime,
   * and only after the backend has been restarted.
   */
  shouldRetry(
    attempt: number,
    error: Pick<ClassifiedError, 'type'>,
    backendRestarts = 0,
  ): boolean {
    if (attempt > this.settings.retry.ceiling) {
      return false;
    }
    switch (error.type) {
      case 'transient':
        return true;
      case 'fatal_backend':
        return backendRestarts < 1;
      case 'fatal_input':
      case 'fatal_upload':
        return false;
    }
  }

  /** Delay before `attempt` without jitter. */
  nominalBackoff(attempt: number, reason?: string): number {
    if (attempt < 2) {
      return 0;
    }
    const { backoffBaseMs, backoffMaxMs, notReadyFactor } = this.settings.retry;
    let delay = Math.min(backoffMaxMs, backoffBaseMs * 2 ** (attempt - 2));
    if (reason === 'backend_not_ready') {
      delay = Math.min(backoffMaxMs, delay * notReadyFactor);
    }
    return delay;
  }

  /**
   * Jitter only ever shortens the nominal delay, so the cap holds.
   */
  backoffBefore(attempt: number, reason?: string): number {
    const nominal = this.nominalBackoff(attempt, reason);
    const jitter = nominal * this.settings.retry.jitterRatio * this.random();
    return Math.max(0, Math.floor(nominal - jitter));
  }
}
