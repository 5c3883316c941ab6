import type { BackendResult, ClassifiedError } from '../backends/backend.types';
import type { UploadResult } from '../upload/uploader.types';
import type { AttemptRecord, Job, JobStatus } from './job.types';

export type AttemptMeta = {
  timeoutMs?: number;
  durationMs?: number;
  backendRestarts?: number;
  detectedTapeType?: string;
};

type ErrorFields = Pick<Job, 'failure_type' | 'failure_reason' | 'last_error'>;

export type CompletionPatch = ErrorFields &
  Pick<Job, 'artifact_ref' | 'upload_ref' | 'timeout_ms' | 'backend_restarts' | 'history'> & {
    status: Extract<JobStatus, 'succeeded' | 'failed' | 'upload_failed'>;
    finished_at: Date;
  };

export type RetryPatch = ErrorFields &
  Pick<Job, 'timeout_ms' | 'backend_restarts' | 'elapsed_backoff_ms' | 'history'> & {
    status: 'retrying';
  };

export type RecoveryPatch =
  | (ErrorFields & Pick<Job, 'history'> & { status: 'retrying'; finished_at: null })
  | (ErrorFields & Pick<Job, 'history'> & { status: 'failed'; finished_at: Date });

export const INTERRUPTED_ERROR: ClassifiedError = {
  type: 'transient',
  reason: 'interrupted',
  message: 'interrupted by worker restart',
};

function errorFields(error: ClassifiedError | null): ErrorFields {
  return {
    failure_type: error?.type ?? null,
    failure_reason: error?.reason ?? null,
    last_error: error?.message ?? null,
  };
}

function record(
  job: Job,
  outcome: AttemptRecord['outcome'],
  error: ClassifiedError | null,
  durationMs: number | null,
  timeoutMs: number | null,
  now: Date,
  detectedTapeType?: string,
): AttemptRecord {
  return {
    attempt: job.attempts,
    outcome,
    failure_type: error?.type ?? null,
    error: error?.message ?? null,
    duration_ms: durationMs,
    timeout_ms: timeoutMs,
    finished_at: now.toISOString(),
    ...(detectedTapeType ? { detected_tape_type: detectedTapeType } : {}),
  };
}

/**
 * Terminal outcome of a running job. The mapping is mechanical: a failed
 * result fails the job, a failed upload of a good result is upload_failed.
 */
export function completionPatch(
  job: Job,
  result: BackendResult,
  upload: UploadResult | undefined,
  meta: AttemptMeta,
  now: Date,
): CompletionPatch {
  let status: CompletionPatch['status'] = 'succeeded';
  let error: ClassifiedError | null = null;
  if (!result.success) {
    status = 'failed';
    error = result.error;
  } else if (upload && !upload.success) {
    status = 'upload_failed';
    error = upload.error;
  }

  const timeoutMs = meta.timeoutMs ?? job.timeout_ms;
  return {
    status,
    ...errorFields(error),
    artifact_ref: result.success ? result.artifactRef : null,
    upload_ref: upload?.success ? upload.uploadRef : null,
    timeout_ms: timeoutMs,
    backend_restarts: meta.backendRestarts ?? job.backend_restarts,
    finished_at: now,
    history: [
      ...job.history,
      record(job, status, error, result.durationMs, timeoutMs, now, result.detectedTapeType),
    ],
  };
}

export function retryPatch(
  job: Job,
  delayMs: number,
  error: ClassifiedError,
  meta: AttemptMeta,
  now: Date,
): RetryPatch {
  const timeoutMs = meta.timeoutMs ?? job.timeout_ms;
  return {
    status: 'retrying',
    ...errorFields(error),
    timeout_ms: timeoutMs,
    backend_restarts: meta.backendRestarts ?? job.backend_restarts,
    elapsed_backoff_ms: job.elapsed_backoff_ms + delayMs,
    history: [
      ...job.history,
      record(job, 'retrying', error, meta.durationMs ?? null, timeoutMs, now, meta.detectedTapeType),
    ],
  };
}

/**
 * A job found running at startup lost its worker mid-attempt. It is never
 * resumed: it either goes back to retrying or, with no attempts left, fails.
 */
export function recoveryPatch(job: Job, maxAttempts: number, now: Date): RecoveryPatch {
  const history = [
    ...job.history,
    record(job, 'interrupted', INTERRUPTED_ERROR, null, job.timeout_ms, now),
  ];
  if (job.attempts >= maxAttempts) {
    return { status: 'failed', ...errorFields(INTERRUPTED_ERROR), finished_at: now, history };
  }
  return { status: 'retrying', ...errorFields(INTERRUPTED_ERROR), finished_at: null, history };
}
