import type { BackendKind, FailureType, JobStatus } from '@reelqueue/shared';

export type { BackendKind, FailureType, JobStatus };

export type JobParams = Record<string, unknown>;

export type AttemptRecord = {
  attempt: number;
  outcome: 'succeeded' | 'failed' | 'retrying' | 'upload_failed' | 'interrupted';
  failure_type: FailureType | null;
  error: string | null;
  duration_ms: number | null;
  timeout_ms: number | null;
  finished_at: string;
  detected_tape_type?: string;
};

export type Job = {
  id: number;
  status: JobStatus;
  backend: BackendKind;
  source_path: string;
  params: JobParams;
  attempts: number;
  backend_restarts: number;
  timeout_ms: number | null;
  elapsed_backoff_ms: number;
  failure_type: FailureType | null;
  failure_reason: string | null;
  last_error: string | null;
  artifact_ref: string | null;
  upload_ref: string | null;
  history: AttemptRecord[];
  enqueued_at: Date;
  available_at: Date;
  started_at: Date | null;
  finished_at: Date | null;
};

export type NewJob = {
  backend: BackendKind;
  source_path: string;
  params?: JobParams;
};

export type QueueStats = {
  total: number;
  by_status: Record<JobStatus, number>;
  avg_processing_seconds: number | null;
};
