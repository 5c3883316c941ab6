import { Inject, Injectable } from '@nestjs/common';
import type { Pool } from 'pg';
import { emptyStatusCounts } from '@reelqueue/shared';
import type { BackendKind, FailureType, JobStatus } from '@reelqueue/shared';
import { JobInsertFailedError, JobNotFoundError } from '../errors';
import { PG_POOL } from '../tokens';

export type JobSummaryRow = {
  id: number;
  status: JobStatus;
  backend: BackendKind;
  source_path: string;
  attempts: number;
  failure_type: FailureType | null;
  failure_reason: string | null;
  last_error: string | null;
  artifact_ref: string | null;
  upload_ref: string | null;
  enqueued_at: Date;
  available_at: Date;
  started_at: Date | null;
  finished_at: Date | null;
};

export type JobRow = JobSummaryRow & {
  params: Record<string, unknown>;
  backend_restarts: number;
  timeout_ms: number | null;
  elapsed_backoff_ms: number;
  history: unknown[];
};

export type JobStats = {
  total: number;
  by_status: Record<JobStatus, number>;
  avg_processing_seconds: number | null;
};

const SUMMARY_COLUMNS = `
  id, status, backend, source_path, attempts, failure_type, failure_reason,
  last_error, artifact_ref, upload_ref, enqueued_at, available_at, started_at,
  finished_at
`;

const DETAIL_COLUMNS = `
  ${SUMMARY_COLUMNS}, params, backend_restarts, timeout_ms, elapsed_backoff_ms, history
`;

@Injectable()
export class JobsRepository {
  constructor(@Inject(PG_POOL) private readonly pool: Pool) {}

  async insertJob(input: {
    backend: BackendKind;
    sourcePath: string;
    params: Record<string, unknown>;
  }): Promise<JobRow> {
    const result = await this.pool.query<JobRow>(
      `
      INSERT INTO jobs (backend, source_path, params)
      VALUES ($1, $2, $3::jsonb)
      RETURNING ${DETAIL_COLUMNS}
      `,
      [input.backend, input.sourcePath, JSON.stringify(input.params)],
    );
    const row = result.rows[0];
    if (!row) {
      throw new JobInsertFailedError();
    }
    return row;
  }

  async findJobs(filters: {
    status?: JobStatus;
    backend?: BackendKind;
    limit: number;
  }): Promise<JobSummaryRow[]> {
    const conditions: string[] = [];
    const params: unknown[] = [];

    if (filters.status !== undefined) {
      params.push(filters.status);
      conditions.push(`status = $${params.length}`);
    }
    if (filters.backend !== undefined) {
      params.push(filters.backend);
      conditions.push(`backend = $${params.length}`);
    }

    const whereClause =
      conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
    params.push(filters.limit);

    const result = await this.pool.query<JobSummaryRow>(
      `
      SELECT ${SUMMARY_COLUMNS}
      FROM jobs
      ${whereClause}
      ORDER BY id DESC
      LIMIT $${params.length}
      `,
      params,
    );
    return result.rows;
  }

  async getById(id: number): Promise<JobRow> {
    const result = await this.pool.query<JobRow>(
      `SELECT ${DETAIL_COLUMNS} FROM jobs WHERE id = $1`,
      [id],
    );
    if (result.rows.length === 0) {
      throw new JobNotFoundError(id);
    }
    return result.rows[0];
  }

  async ping(): Promise<void> {
    await this.pool.query('SELECT 1');
  }

  async getStats(): Promise<JobStats> {
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

  async getServerNow(): Promise<Date> {
    const result = await this.pool.query<{ now: Date }>('SELECT NOW() AS now');
    return result.rows[0].now;
  }
}
