/**
 * Job contract shared by the worker (which dispatches jobs) and the API
 * (which submits them and reports their status).
 */
export const BACKEND_KINDS = ["transcoder", "editor", "upscaler"] as const;

export type BackendKind = (typeof BACKEND_KINDS)[number];

export const JOB_STATUSES = [
  "pending",
  "running",
  "retrying",
  "succeeded",
  "failed",
  "upload_failed",
] as const;

export type JobStatus = (typeof JOB_STATUSES)[number];

export const TERMINAL_STATUSES: readonly JobStatus[] = [
  "succeeded",
  "failed",
  "upload_failed",
];

export function isTerminalStatus(status: JobStatus): boolean {
  return TERMINAL_STATUSES.includes(status);
}

export const FAILURE_TYPES = [
  "transient",
  "fatal_input",
  "fatal_backend",
  "fatal_upload",
] as const;

export type FailureType = (typeof FAILURE_TYPES)[number];

export function emptyStatusCounts(): Record<JobStatus, number> {
  return {
    pending: 0,
    running: 0,
    retrying: 0,
    succeeded: 0,
    failed: 0,
    upload_failed: 0,
  };
}
