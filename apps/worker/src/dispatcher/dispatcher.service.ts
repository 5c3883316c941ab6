import { Inject, Injectable, OnApplicationBootstrap } from '@nestjs/common';
import { logger } from '@reelqueue/shared';
import type { WorkerConfig } from '../config';
import { BackendRegistry } from '../backends/backend.registry';
import type { BackendAdapter, BackendResult } from '../backends/backend.types';
import type { ProfileSource } from '../environment/environment.types';
import type { JobQueue } from '../jobs/job.queue';
import type { BackendKind, Job } from '../jobs/job.types';
import { classifyFailure } from '../retry/failure-classifier';
import { RetryPolicy } from '../retry/retry.policy';
import { JOB_QUEUE, PROFILE_SOURCE, UPLOADER, WORKER_CONFIG } from '../tokens';
import type { UploadResult, Uploader } from '../upload/uploader.types';

export type SlotState = 'idle' | 'dispatching' | 'awaiting_result' | 'retry_scheduled';

export type SlotSnapshot = {
  jobId: number;
  kind: BackendKind;
  state: Exclude<SlotState, 'idle'>;
};

type Slot = SlotSnapshot & { task?: Promise<void> };

/**
 * Pulls jobs from the queue into a bounded set of slots. Capacity is read
 * from the current environment profile before every dispatch decision, so a
 * profile refresh takes effect on the next claim without touching jobs that
 * are already running.
 */
@Injectable()
export class DispatcherService implements OnApplicationBootstrap {
  /** Keyed per launch: a requeued job may be claimed again before its old slot clears. */
  private readonly slots = new Map<number, Slot>();
  private nextSlotId = 1;
  private readonly shutdown = new AbortController();
  private loop: Promise<void> | null = null;
  private stopping = false;
  private filling = false;
  private wake: (() => void) | null = null;
  private wakePending = false;
  private isIdle = false;
  private isErrorIdle = false;

  constructor(
    @Inject(JOB_QUEUE) private readonly queue: JobQueue,
    private readonly registry: BackendRegistry,
    private readonly policy: RetryPolicy,
    @Inject(PROFILE_SOURCE) private readonly profiles: ProfileSource,
    @Inject(UPLOADER) private readonly uploader: Uploader,
    @Inject(WORKER_CONFIG) private readonly config: Pick<WorkerConfig, 'pollIntervalMs'>,
  ) {}

  async onApplicationBootstrap() {
    await this.recover();
    this.start();
  }

  /**
   * Jobs left running by a previous process are never resumed; they are
   * requeued, or failed when they have no attempts left.
   */
  async recover(): Promise<void> {
    const report = await this.queue.recoverInFlight(this.policy.maxAttempts);
    if (report.requeued.length > 0 || report.failed.length > 0) {
      logger.warn(
        { service: 'worker', requeued: report.requeued, failed: report.failed },
        'recovered interrupted jobs',
      );
    }
  }

  start(): void {
    if (this.loop) return;
    this.loop = this.run();
  }

  /**
   * Aborts every in-flight submit and resolves once all slots are vacated.
   * Uploads already under way are not aborted; they finish within their own
   * upload timeout.
   */
  async stop(): Promise<void> {
    this.stopping = true;
    this.shutdown.abort();
    this.notify();
    await this.loop;
    await this.drain();
    logger.info({ service: 'worker' }, 'dispatcher stopped');
  }

  /** Resolves once every currently occupied slot has finished. */
  async drain(): Promise<void> {
    while (this.slots.size > 0) {
      await Promise.allSettled([...this.slots.values()].map((slot) => slot.task));
    }
  }

  snapshot(): SlotSnapshot[] {
    return [...this.slots.values()].map(({ jobId, kind, state }) => ({ jobId, kind, state }));
  }

  /**
   * Claims jobs until every backend with capacity has been served or the
   * queue has nothing eligible. Returns the number of jobs launched.
   */
  async fillSlots(): Promise<number> {
    if (this.filling) return 0;
    this.filling = true;
    let launched = 0;
    try {
      while (!this.stopping) {
        const eligible = this.eligibleKinds();
        if (eligible.length === 0) break;

        const job = await this.queue.dequeueNext({ backends: eligible });
        if (!job) break;
        this.launch(job);
        launched += 1;
      }
    } finally {
      this.filling = false;
    }
    return launched;
  }

  private eligibleKinds(): BackendKind[] {
    const globalCap = this.profiles.current().maxConcurrentJobs;
    if (this.slots.size >= globalCap) {
      return [];
    }
    return this.registry
      .enabledKinds()
      .filter(({ kind, maxConcurrency }) => {
        const cap = Math.min(globalCap, maxConcurrency ?? globalCap);
        return this.occupied(kind) < cap;
      })
      .map(({ kind }) => kind);
  }

  private occupied(kind: BackendKind): number {
    let count = 0;
    for (const slot of this.slots.values()) {
      if (slot.kind === kind) count += 1;
    }
    return count;
  }

  private async run(): Promise<void> {
    logger.info({ service: 'worker' }, 'dispatcher started');
    while (!this.stopping) {
      try {
        const launched = await this.fillSlots();
        this.isErrorIdle = false;
        if (launched === 0 && this.slots.size === 0) {
          if (!this.isIdle) {
            logger.info({ service: 'worker' }, 'no jobs available');
            this.isIdle = true;
          }
        } else {
          this.isIdle = false;
        }
      } catch (error) {
        if (!this.isErrorIdle) {
          logger.error({ service: 'worker', error }, 'error in dispatch loop');
          this.isErrorIdle = true;
        }
        this.isIdle = false;
      }
      await this.sleepUntilWoken(this.config.pollIntervalMs);
    }
  }

  private launch(job: Job): void {
    const slotId = this.nextSlotId++;
    const slot: Slot = { jobId: job.id, kind: job.backend, state: 'dispatching' };
    this.slots.set(slotId, slot);
    slot.task = this.process(slot, job)
      .catch((error: unknown) => {
        logger.error(
          { service: 'worker', job_id: job.id, backend: job.backend, error },
          'slot failed to record job outcome',
        );
      })
      .finally(() => {
        this.slots.delete(slotId);
        this.notify();
      });
  }

  private async process(slot: Slot, job: Job): Promise<void> {
    const adapter = this.registry.get(job.backend);
    const timeoutMs = this.policy.timeoutFor(job, this.profiles.current());
    const log = { service: 'worker', job_id: job.id, backend: job.backend, attempt: job.attempts };
    logger.info({ ...log, timeout_ms: timeoutMs }, 'job started');

    slot.state = 'awaiting_result';
    const startedAt = Date.now();
    let result: BackendResult;
    try {
      result = await adapter.submit(job, timeoutMs, this.shutdown.signal);
    } catch (error) {
      result = { success: false, error: classifyFailure(error), durationMs: Date.now() - startedAt };
    }

    if (!result.success) {
      await this.handleFailure(slot, job, adapter, result, timeoutMs);
      return;
    }

    let upload: UploadResult | undefined;
    if (this.uploader.enabled) {
      upload = await this.uploadArtifact(result.artifactRef, job);
    } else {
      logger.debug({ ...log, artifact_ref: result.artifactRef }, 'upload skipped');
    }

    const done = await this.recordOutcome(job, () =>
      this.queue.markResult(job.id, result, upload, { timeoutMs }),
    );
    if (!done) return;
    if (done.status === 'upload_failed') {
      logger.error(
        { ...log, artifact_ref: done.artifact_ref, error: upload?.success === false ? upload.error : undefined },
        'job upload_failed',
      );
    } else {
      logger.info(
        { ...log, artifact_ref: done.artifact_ref, upload_ref: done.upload_ref, duration_ms: result.durationMs },
        'job succeeded',
      );
    }
  }

  private async uploadArtifact(artifactRef: string, job: Job): Promise<UploadResult> {
    try {
      const upload = await this.uploader.upload(artifactRef, job);
      if (upload.success) {
        return upload;
      }
      // Upload retries happen inside the uploader; whatever comes back here is final.
      return { success: false, error: { ...upload.error, type: 'fatal_upload' } };
    } catch (error) {
      const classified = classifyFailure(error);
      return {
        success: false,
        error: { type: 'fatal_upload', reason: classified.reason, message: classified.message },
      };
    }
  }

  private async handleFailure(
    slot: Slot,
    job: Job,
    adapter: BackendAdapter,
    result: Extract<BackendResult, { success: false }>,
    timeoutMs: number,
  ): Promise<void> {
    const log = { service: 'worker', job_id: job.id, backend: job.backend, attempt: job.attempts };
    let { error } = result;
    let backendRestarts = job.backend_restarts;

    if (this.policy.shouldRetry(job.attempts, error, backendRestarts)) {
      if (error.type === 'fatal_backend') {
        backendRestarts += 1;
        const restartError = await this.restartBackend(adapter);
        if (restartError) {
          error = { type: 'fatal_backend', reason: 'restart_failed', message: restartError };
          const failedJob = await this.recordOutcome(job, () =>
            this.queue.markResult(job.id, { ...result, error }, undefined, {
              timeoutMs,
              backendRestarts,
            }),
          );
          if (!failedJob) return;
          logger.error({ ...log, error }, 'job failed');
          return;
        }
      }

      slot.state = 'retry_scheduled';
      const delayMs = this.stopping ? 0 : this.policy.backoffBefore(job.attempts + 1, error.reason);
      const requeued = await this.recordOutcome(job, () =>
        this.queue.requeue(job.id, delayMs, error, {
          timeoutMs,
          durationMs: result.durationMs,
          backendRestarts,
          detectedTapeType: result.detectedTapeType,
        }),
      );
      if (!requeued) return;
      logger.warn({ ...log, error, delay_ms: delayMs }, 'job retry scheduled');
      return;
    }

    const failedJob = await this.recordOutcome(job, () =>
      this.queue.markResult(job.id, result, undefined, { timeoutMs, backendRestarts }),
    );
    if (!failedJob) return;
    logger.error({ ...log, error }, 'job failed');
  }

  /**
   * Retries a queue write until it lands, holding the slot meanwhile. Once the
   * dispatcher is stopping one last attempt is made; a job still unrecorded
   * after that stays running and is picked up by recovery on the next start.
   */
  private async recordOutcome(job: Job, write: () => Promise<Job>): Promise<Job | null> {
    for (let attempt = 1; ; attempt += 1) {
      try {
        return await write();
      } catch (error) {
        const log = { service: 'worker', job_id: job.id, backend: job.backend, error };
        if (this.stopping && attempt > 1) {
          logger.error(log, 'job outcome not recorded, leaving it for recovery');
          return null;
        }
        const delayMs = this.stopping ? 0 : this.policy.backoffBefore(attempt + 1);
        logger.error({ ...log, delay_ms: delayMs }, 'failed to record job outcome');
        await this.pause(delayMs);
      }
    }
  }

  private pause(ms: number): Promise<void> {
    const { signal } = this.shutdown;
    if (ms <= 0 || signal.aborted) return Promise.resolve();
    return new Promise((resolve) => {
      const done = () => {
        clearTimeout(timer);
        signal.removeEventListener('abort', done);
        resolve();
      };
      const timer = setTimeout(done, ms);
      signal.addEventListener('abort', done, { once: true });
    });
  }

  /** Returns an error message when the backend could not be restarted. */
  private async restartBackend(adapter: BackendAdapter): Promise<string | null> {
    if (!adapter.restart) {
      return `backend ${adapter.kind} cannot be restarted`;
    }
    try {
      await adapter.restart();
      return null;
    } catch (error) {
      logger.error({ service: 'worker', backend: adapter.kind, error }, 'backend restart failed');
      return error instanceof Error ? error.message : String(error);
    }
  }

  private sleepUntilWoken(ms: number): Promise<void> {
    if (this.wakePending || this.stopping) {
      this.wakePending = false;
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      const done = () => {
        clearTimeout(timer);
        this.wake = null;
        resolve();
      };
      const timer = setTimeout(done, ms);
      this.wake = done;
    });
  }

  private notify(): void {
    if (this.wake) {
      this.wake();
    } else {
      this.wakePending = true;
    }
  }
}
