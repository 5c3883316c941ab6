import type { Pool, PoolClient } from 'pg';
import { TERMINAL_STATUSES, emptyStatusCounts, logger } from '@reelqueue/shared';
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
import type { Job, JobStatus, NewJob, QueueStats } from './job.types';

const JOB_COLUMNS = `
  id, status, backend, source_path, params, attempts, backend_restarts,
  timeout_ms, elapsed_backoff_ms, failure_type, failure_reason, last_error,
  artifact_ref, upload_ref, history, enqueued_at, available_at, started_at,
  finished_at
`;

export class PgJobQueue implements JobQueue {
  constructor(
    private readonly pool: Pool,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async enqueue(input: NewJob): Promise<Job> {
    const result = await this.pool.query<Job>(
      `
      INSERT INTO jobs (backend, source_path, params)
      VALUES ($1, $2, $3::jsonb)
      RETURNING ${JOB_COLUMNS}
      `,
      [input.backend, input.source_path, JSON.stringify(input.params ?? {})],
    );
    return result.rows[0];
  }

  /**
   * Claims a job atomically using SELECT ... FOR UPDATE SKIP LOCKED.
   * Increments attempts when transitioning to running.
   */
  async dequeueNext(filter: DequeueFilter): Promise<Job | null> {
    if (filter.backends.length === 0) {
      return null;
    }
    return this.transaction(async (client) => {
      const candidate = await client.query<{ id: number }>(
        `
        SELECT id
        FROM jobs
        WHERE backend = ANY($1::text[])
          AND (status = 'pending' OR (status = 'retrying' AND available_at <= NOW()))
        ORDER BY id ASC
        FOR UPDATE SKIP LOCKED
        LIMIT 1
        `,
        [filter.backends],
      );
      if (candidate.rows.length === 0) {
        return null;
      }

      const claimed = await client.query<Job>(
        `
        UPDATE jobs
        SET status = 'running', attempts = attempts + 1, started_at = NOW()
        WHERE id = $1
        RETURNING ${JOB_COLUMNS}
        `,
        [candidate.rows[0].id],
      );
      const job = claimed.rows[0];
      logger.info(
        { service: 'worker', job_id: job.id, backend: job.backend, attempt: job.attempts },
        'job claimed',
      );
      return job;
    });
  }

  async markRunning(id: number): Promise<Job> {
    return this.transaction(async (client) => {
      const job = await this.lock(client, id);
      if (job.status !== 'pending' && job.status !== 'retrying') {
        throw new JobInvalidStateError(id, job.status, 'pending or retrying');
      }
      const result = await client.query<Job>(
        `
        UPDATE jobs
        SET status = 'running', attempts = attempts + 1, started_at = NOW()
        WHERE id = $1
        RETURNING ${JOB_COLUMNS}
        `,
        [id],
      );
      return result.rows[0];
    });
  }

  async markResult(
    id: number,
    result: BackendResult,
    upload?: UploadResult,
    meta: AttemptMeta = {},
  ): Promise<Job> {
    return this.transaction(async (client) => {
      const job = await this.lockRunning(client, id);
      const patch = completionPatch(job, result, upload, meta, this.now());
      const updated = await client.query<Job>(
        `
        UPDATE jobs
        SET status = $2,
            failure_type = $3,
            failure_reason = $4,
            last_error = $5,
            artifact_ref = $6,
            upload_ref = $7,
            timeout_ms = $8,
            backend_restarts = $9,
            finished_at = $10,
            history = $11::jsonb
        WHERE id = $1
        RETURNING ${JOB_COLUMNS}
        `,
        [
          id,
          patch.status,
          patch.failure_type,
          patch.failure_reason,
          patch.last_error,
          patch.artifact_ref,
          patch.upload_ref,
          patch.timeout_ms,
          patch.backend_restarts,
          patch.finished_at,
          JSON.stringify(patch.history),
        ],
      );
      return updated.rows[0];
    });
  }

  /**
   * Sets status back to retrying and schedules available_at.
   */
  async requeue(
    id: number,
    delayMs: number,
    error: ClassifiedError,
    meta: AttemptMeta = {},
  ): Promise<Job> {
    return this.transaction(async (client) => {
      const job = await this.lockRunning(client, id);
      const patch = retryPatch(job, delayMs, error, meta, this.now());
      const updated = await client.query<Job>(
        `
        UPDATE jobs
        SET status = 'retrying',
            failure_type = $2,
            failure_reason = $3,
            last_error = $4,
            timeout_ms = $5,
            backend_restarts = $6,
            elapsed_backoff_ms = $7,
            history = $8::jsonb,
            available_at = NOW() + ($9::text || ' milliseconds')::interval
        WHERE id = $1
        RETURNING ${JOB_COLUMNS}
        `,
        [
          id,
          patch.failure_type,
          patch.failure_reason,
          patch.last_error,
          patch.timeout_ms,
          patch.backend_restarts,
          patch.elapsed_backoff_ms,
          JSON.stringify(patch.history),
          delayMs,
        ],
      );
      return updated.rows[0];
    });
  }

  async recoverInFlight(maxAttempts: number): Promise<RecoveryReport> {
    return this.transaction(async (client) => {
      const report: RecoveryReport = { requeued: [], failed: [] };
      const running = await client.query<Job>(
        `SELECT ${JOB_COLUMNS} FROM jobs WHERE status = 'running' ORDER BY id ASC FOR UPDATE`,
      );
      for (const job of running.rows) {
        const patch = recoveryPatch(job, maxAttempts, this.now());
        await client.query(
          `
          UPDATE jobs
          SET status = $2,
              failure_type = $3,
              failure_reason = $4,
              last_error = $5,
              finished_at = $6,
              history = $7::jsonb,
              available_at = NOW()
          WHERE id = $1
          `,
          [
            job.id,
            patch.status,
            patch.failure_type,
            patch.failure_reason,
            patch.last_error,
            patch.finished_at,
            JSON.stringify(patch.history),
          ],
        );
        (patch.status === 'failed' ? report.failed : report.requeued).push(job.id);
      }
      return report;
    });
  }

  async get(id: number): Promise<Job | null> {
    const result = await this.pool.query<Job>(
      `SELECT ${JOB_COLUMNS} FROM jobs WHERE id = $1`,
      [id],
    );
    return result.rows[0] ?? null;
  }

  async stats(): Promise<QueueStats> {
    const counts = await this.pool.query<{ status: JobStatus; count: number }>(
      'SELECT status, COUNT(*)::int AS count FROM jobs GROUP BY status',
    );
    const average = await this.pool.query<{ avg_seconds: number | null }>(
      `
      SELECT AVG(EXTRACT(EPOCH FROM finished_at - started_at))::float8 AS avg_seconds
      FROM jobs
      WHERE status = 'succeeded' AND started_at IS NOT NULL AND finished_at IS NOT NULL
      `,
    );

    const byStatus = emptyStatusCounts();
    let total = 0;
    for (const row of counts.rows) {
      byStatus[row.status] = row.count;
      total += row.count;
    }
    return {
      total,
      by_status: byStatus,
      avg_processing_seconds: average.rows[0]?.avg_seconds ?? null,
    };
  }

  async pruneTerminal(olderThan: Date): Promise<number> {
    const result = await this.pool.query(
      'DELETE FROM jobs WHERE status = ANY($1::text[]) AND finished_at < $2',
      [TERMINAL_STATUSES, olderThan],
    );
    return result.rowCount ?? 0;
  }

  private async lock(client: PoolClient, id: number): Promise<Job> {
    const result = await client.query<Job>(
      `SELECT ${JOB_COLUMNS} FROM jobs WHERE id = $1 FOR UPDATE`,
      [id],
    );
    if (result.rows.length === 0) {
      throw new JobNotFoundError(id);
    }
    return result.rows[0];
  }

  private async lockRunning(client: PoolClient, id: number): Promise<Job> {
    const job = await this.lock(client, id);
    if (job.status !== 'running') {
      throw new JobInvalidStateError(id, job.status, 'running');
    }
    return job;
  }

  private async transaction<T>(work: (client: PoolClient) => Promise<T>): Promise<T> {
    const client = await this.pool.connect();
    try {
      await client.query('BEGIN');
      const result = await work(client);
      await client.query('COMMIT');
      return result;
    } catch (error) {
      await client.query('ROLLBACK').catch(() => {
        // ignore rollback errors
      });
      throw error;
    } finally {
      client.release();
    }
  }
}
