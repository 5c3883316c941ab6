import { emptyStatusCounts, isTerminalStatus } from '@reelqueue/shared';
import type { BackendResult, ClassifiedError } from '../backends/backend.types';
import { JobInvalidStateError, JobNotFoundError } from '../errors';
import type { UploadResult } from '../upload/uploader.types';
import type { DequeueFilter, JobQueue, RecoveryReport } from './job.queue';
import {
  AttemptMeta,
  completionPatch,
  recoveryPatch,
  retryPatch,
} from './job.transitions';
import type { Job, NewJob, QueueStats } from './job.types';

/**
 * Process-local queue with the same transition rules as the PostgreSQL one.
 * Backs the test-suite and QUEUE_DRIVER=memory dry runs; nothing survives a
 * restart.
 */
export class InMemoryJobQueue implements JobQueue {
  private readonly jobs = new Map<number, Job>();
  private nextId = 1;

  constructor(private readonly now: () => Date = () => new Date()) {}

  async enqueue(input: NewJob): Promise<Job> {
    const now = this.now();
    const job: Job = {
      id: this.nextId++,
      status: 'pending',
      backend: input.backend,
      source_path: input.source_path,
      params: input.params ?? {},
      attempts: 0,
      backend_restarts: 0,
      timeout_ms: null,
      elapsed_backoff_ms: 0,
      failure_type: null,
      failure_reason: null,
      last_error: null,
      artifact_ref: null,
      upload_ref: null,
      history: [],
      enqueued_at: now,
      available_at: now,
      started_at: null,
      finished_at: null,
    };
    this.jobs.set(job.id, job);
    return { ...job };
  }

  async dequeueNext(filter: DequeueFilter): Promise<Job | null> {
    const now = this.now();
    const candidate = [...this.jobs.values()]
      .filter((job) => filter.backends.includes(job.backend))
      .filter(
        (job) =>
          job.status === 'pending' ||
          (job.status === 'retrying' && job.available_at.getTime() <= now.getTime()),
      )
      .sort((a, b) => a.id - b.id)[0];
    if (!candidate) {
      return null;
    }
    return this.start(candidate, now);
  }

  async markRunning(id: number): Promise<Job> {
    const job = this.require(id);
    if (job.status !== 'pending' && job.status !== 'retrying') {
      throw new JobInvalidStateError(id, job.status, 'pending or retrying');
    }
    return this.start(job, this.now());
  }

  async markResult(
    id: number,
    result: BackendResult,
    upload?: UploadResult,
    meta: AttemptMeta = {},
  ): Promise<Job> {
    const job = this.requireRunning(id);
    return this.save({ ...job, ...completionPatch(job, result, upload, meta, this.now()) });
  }

  async requeue(
    id: number,
    delayMs: number,
    error: ClassifiedError,
    meta: AttemptMeta = {},
  ): Promise<Job> {
    const job = this.requireRunning(id);
    const now = this.now();
    return this.save({
      ...job,
      ...retryPatch(job, delayMs, error, meta, now),
      available_at: new Date(now.getTime() + delayMs),
    });
  }

  async recoverInFlight(maxAttempts: number): Promise<RecoveryReport> {
    const report: RecoveryReport = { requeued: [], failed: [] };
    const now = this.now();
    for (const job of this.jobs.values()) {
      if (job.status !== 'running') continue;
      const patch = recoveryPatch(job, maxAttempts, now);
      this.save({ ...job, ...patch, available_at: now });
      (patch.status === 'failed' ? report.failed : report.requeued).push(job.id);
    }
    return report;
  }

  async get(id: number): Promise<Job | null> {
    const job = this.jobs.get(id);
    return job ? { ...job } : null;
  }

  async stats(): Promise<QueueStats> {
    const byStatus = emptyStatusCounts();
    const durations: number[] = [];
    for (const job of this.jobs.values()) {
      byStatus[job.status] += 1;
      if (job.status === 'succeeded' && job.started_at && job.finished_at) {
        durations.push((job.finished_at.getTime() - job.started_at.getTime()) / 1000);
      }
    }
    return {
      total: this.jobs.size,
      by_status: byStatus,
      avg_processing_seconds:
        durations.length > 0
          ? durations.reduce((sum, d) => sum + d, 0) / durations.length
          : null,
    };
  }

  async pruneTerminal(olderThan: Date): Promise<number> {
    let removed = 0;
    for (const [id, job] of this.jobs) {
      if (
        isTerminalStatus(job.status) &&
        job.finished_at &&
        job.finished_at.getTime() < olderThan.getTime()
      ) {
        this.jobs.delete(id);
        removed += 1;
      }
    }
    return removed;
  }

  private start(job: Job, now: Date): Job {
    return this.save({
      ...job,
      status: 'running',
      attempts: job.attempts + 1,
      started_at: now,
    });
  }

  private save(job: Job): Job {
    this.jobs.set(job.id, job);
    return { ...job };
  }

  private require(id: number): Job {
    const job = this.jobs.get(id);
    if (!job) {
      throw new JobNotFoundError(id);
    }
    return job;
  }

  private requireRunning(id: number): Job {
    const job = this.require(id);
    if (job.status !== 'running') {
      throw new JobInvalidStateError(id, job.status, 'running');
    }
    return job;
  }
}
