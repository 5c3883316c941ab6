import type { BackendKind, FailureType, Job } from '../jobs/job.types';

/**
 * Backend-agnostic error shape. Adapters translate whatever their tool
 * reports into one of these before it crosses the adapter boundary.
 */
export type ClassifiedError = {
  type: FailureType;
  reason: string;
  message: string;
};

/** `detectedTapeType` is set when the adapter had to detect the tape format itself. */
export type BackendResult =
  | { success: true; artifactRef: string; durationMs: number; detectedTapeType?: string }
  | { success: false; error: ClassifiedError; durationMs: number; detectedTapeType?: string };

export interface BackendAdapter {
  readonly kind: BackendKind;

  /**
   * Runs one attempt of the job. Resolves once the underlying operation has
   * fully stopped, whatever the outcome; never rejects for backend failures.
   */
  submit(job: Job, timeoutMs: number, signal?: AbortSignal): Promise<BackendResult>;

  /**
   * Explicit restart step required before retrying a `fatal_backend` failure.
   */
  restart?(): Promise<void>;
}

export function failed(
  type: FailureType,
  reason: string,
  message: string,
  durationMs: number,
): BackendResult {
  return { success: false, error: { type, reason, message }, durationMs };
}

/**
 * Combines the per-attempt timeout with an optional outer cancellation
 * signal. `timedOut()` tells the two causes apart after an abort.
 */
export function attemptSignal(timeoutMs: number, outer?: AbortSignal) {
  const timeout = AbortSignal.timeout(timeoutMs);
  const signal = outer ? AbortSignal.any([timeout, outer]) : timeout;
  return {
    signal,
    timedOut: () => timeout.aborted && !(outer?.aborted ?? false),
  };
}
