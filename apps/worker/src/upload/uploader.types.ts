import type { ClassifiedError } from '../backends/backend.types';
import type { Job } from '../jobs/job.types';

export type UploadResult =
  | { success: true; uploadRef: string }
  | { success: false; error: ClassifiedError };

export interface Uploader {
  readonly enabled: boolean;
  upload(artifactRef: string, job: Job, signal?: AbortSignal): Promise<UploadResult>;
}

/** Stand-in used when no upload target is configured. */
export class DisabledUploader implements Uploader {
  readonly enabled = false;

  upload(): Promise<UploadResult> {
    return Promise.reject(new Error('upload is not configured'));
  }
}
