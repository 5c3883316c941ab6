import { createReadStream } from 'node:fs';
import { stat } from 'node:fs/promises';
import { basename } from 'node:path';
import { setTimeout as sleep } from 'node:timers/promises';
import { PutObjectCommand, S3Client, S3ServiceException } from '@aws-sdk/client-s3';
import { logger } from '@reelqueue/shared';
import type { ClassifiedError } from '../backends/backend.types';
import { attemptSignal } from '../backends/backend.types';
import type { ProfileSource } from '../environment/environment.types';
import type { Job } from '../jobs/job.types';
import type { RetryPolicy } from '../retry/retry.policy';
import type { UploadResult, Uploader } from './uploader.types';

const FATAL_ERROR_NAMES = [
  'AccessDenied',
  'AllAccessDisabled',
  'InvalidAccessKeyId',
  'NoSuchBucket',
  'SignatureDoesNotMatch',
];

export function classifyUploadError(error: unknown, timedOut: boolean): ClassifiedError {
  const message = error instanceof Error ? error.message : String(error);
  if (timedOut) {
    return { type: 'transient', reason: 'timeout', message: `upload timed out: ${message}` };
  }
  if (error instanceof S3ServiceException) {
    const status = error.$metadata.httpStatusCode;
    if (FATAL_ERROR_NAMES.includes(error.name) || status === 403 || status === 404) {
      return { type: 'fatal_upload', reason: error.name, message };
    }
    return { type: 'transient', reason: error.name, message };
  }
  return { type: 'transient', reason: 'upload_error', message };
}

export type S3UploaderSettings = {
  bucket: string;
  prefix: string;
};

/**
 * Streams finished artifacts to S3-compatible storage under
 * `<prefix><jobId>/<file>`, retrying transient failures with the job retry
 * policy.
 */
export class S3Uploader implements Uploader {
  readonly enabled = true;

  constructor(
    private readonly client: Pick<S3Client, 'send'>,
    private readonly policy: RetryPolicy,
    private readonly profiles: ProfileSource,
    private readonly settings: S3UploaderSettings,
  ) {}

  keyFor(artifactRef: string, job: Pick<Job, 'id'>): string {
    const prefix =
      this.settings.prefix.length > 0 && !this.settings.prefix.endsWith('/')
        ? `${this.settings.prefix}/`
        : this.settings.prefix;
    return `${prefix}${job.id}/${basename(artifactRef)}`;
  }

  async upload(artifactRef: string, job: Job, signal?: AbortSignal): Promise<UploadResult> {
    const key = this.keyFor(artifactRef, job);

    let size: number;
    try {
      size = (await stat(artifactRef)).size;
    } catch (error) {
      return {
        success: false,
        error: {
          type: 'fatal_upload',
          reason: 'missing_artifact',
          message: error instanceof Error ? error.message : String(error),
        },
      };
    }

    for (let attempt = 1; ; attempt += 1) {
      const timeoutMs = this.policy.uploadTimeout(this.profiles.current());
      const attemptAbort = attemptSignal(timeoutMs, signal);
      const body = createReadStream(artifactRef);
      let error: ClassifiedError;
      try {
        await this.client.send(
          new PutObjectCommand({
            Bucket: this.settings.bucket,
            Key: key,
            Body: body,
            ContentLength: size,
          }),
          { abortSignal: attemptAbort.signal },
        );
        logger.info(
          { service: 'worker', job_id: job.id, bucket: this.settings.bucket, key, bytes: size },
          'artifact uploaded',
        );
        return { success: true, uploadRef: `s3://${this.settings.bucket}/${key}` };
      } catch (caught) {
        error = classifyUploadError(caught, attemptAbort.timedOut());
      } finally {
        body.destroy();
      }

      if (signal?.aborted || !this.policy.shouldRetry(attempt, error)) {
        return { success: false, error };
      }

      const delayMs = this.policy.backoffBefore(attempt + 1, error.reason);
      logger.warn(
        { service: 'worker', job_id: job.id, attempt, delay_ms: delayMs, error },
        'upload retry scheduled',
      );
      try {
        await sleep(delayMs, undefined, { signal });
      } catch {
        return { success: false, error };
      }
    }
  }
}
