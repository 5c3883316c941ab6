import type { BackendResult, ClassifiedError } from '../backends/backend.types';
import type { UploadResult } from '../upload/uploader.types';
import type { AttemptMeta } from './job.transitions';
import type { BackendKind, Job, NewJob, QueueStats } from './job.types';

export type { AttemptMeta };

export type DequeueFilter = {
  /** Only jobs for these backends are eligible. Empty means none. */
  backends: readonly BackendKind[];
};

export type RecoveryReport = {
  requeued: number[];
  failed: number[];
};

/**
 * Durable job store. It records transitions and never decides them: retry
 * and terminal decisions belong to the dispatcher.
 */
export interface JobQueue {
  enqueue(input: NewJob): Promise<Job>;

  /**
   * Atomically claims the oldest eligible job (pending, or retrying and due)
   * and moves it to running. Two callers never receive the same job.
   */
  dequeueNext(filter: DequeueFilter): Promise<Job | null>;

  markRunning(id: number): Promise<Job>;

  markResult(
    id: number,
    result: BackendResult,
    upload?: UploadResult,
    meta?: AttemptMeta,
  ): Promise<Job>;

  requeue(id: number, delayMs: number, error: ClassifiedError, meta?: AttemptMeta): Promise<Job>;

  recoverInFlight(maxAttempts: number): Promise<RecoveryReport>;

  get(id: number): Promise<Job | null>;

  stats(): Promise<QueueStats>;

  /** Deletes terminal jobs that finished before `olderThan`. */
  pruneTerminal(olderThan: Date): Promise<number>;
}
