import { basename, extname, join } from 'node:path';
import { setTimeout as sleep } from 'node:timers/promises';
import { z } from 'zod';
import { logger } from '@reelqueue/shared';
import type { WorkerConfig } from '../config';
import { BackendRestartError } from '../errors';
import type { Job } from '../jobs/job.types';
import { classifyFailure } from '../retry/failure-classifier';
import {
  BackendAdapter,
  BackendResult,
  attemptSignal,
  failed,
} from './backend.types';
import {
  BridgeNotReadyError,
  BridgeRequestError,
  BridgeUnavailableError,
  EditorBridgeClient,
} from './editor-bridge.client';
import type { ProcessRunner } from './process-runner';

const editorParamsSchema = z.object({
  preset: z.string().trim().min(1).optional(),
  tape_type: z.string().trim().min(1).optional(),
  output_name: z
    .string()
    .regex(/^[\w.-]+$/, 'must be a plain file name')
    .optional(),
});

const ABORT_REQUEST_TIMEOUT_MS = 5_000;

export type EditorAdapterSettings = WorkerConfig['editor'] & {
  outputDir: string;
  restartPollMs?: number;
};

/**
 * Drives renders through the editor's automation bridge. Only the bridge
 * protocol is known here; the editor itself is an opaque remote process.
 */
export class EditorAutomationAdapter implements BackendAdapter {
  readonly kind = 'editor' as const;

  constructor(
    private readonly client: EditorBridgeClient,
    private readonly runner: ProcessRunner,
    private readonly settings: EditorAdapterSettings,
  ) {}

  async submit(job: Job, timeoutMs: number, signal?: AbortSignal): Promise<BackendResult> {
    const startedAt = Date.now();
    const elapsed = () => Date.now() - startedAt;

    const parsed = editorParamsSchema.safeParse(job.params);
    if (!parsed.success) {
      return failed('fatal_input', 'invalid_params', parsed.error.issues[0].message, elapsed());
    }
    const params = parsed.data;
    const outputName =
      params.output_name ?? `${job.id}-${basename(job.source_path, extname(job.source_path))}.mp4`;

    const attempt = attemptSignal(timeoutMs, signal);
    try {
      const status = await this.client.status(attempt.signal);
      if (!status.ready) {
        return failed('transient', 'backend_not_ready', 'editor bridge reports not ready', elapsed());
      }

      const artifactRef = await this.client.render(
        {
          job_id: job.id,
          source_path: job.source_path,
          output_path: join(this.settings.outputDir, outputName),
          preset: params.preset,
          tape_type: params.tape_type,
        },
        attempt.signal,
      );
      return { success: true, artifactRef, durationMs: elapsed() };
    } catch (error) {
      if (attempt.signal.aborted) {
        await this.abortRender(job.id);
        return attempt.timedOut()
          ? failed('transient', 'timeout', `render exceeded ${timeoutMs}ms`, elapsed())
          : failed('transient', 'cancelled', 'render cancelled by shutdown', elapsed());
      }
      if (error instanceof BridgeUnavailableError) {
        return failed('fatal_backend', 'backend_crashed', error.message, elapsed());
      }
      if (error instanceof BridgeNotReadyError) {
        return failed('transient', 'backend_not_ready', error.message, elapsed());
      }
      if (error instanceof BridgeRequestError) {
        return error.kind === 'input'
          ? failed('fatal_input', 'rejected_input', error.message, elapsed())
          : failed('transient', 'bridge_error', error.message, elapsed());
      }
      const classified = classifyFailure(error);
      return failed(classified.type, classified.reason, classified.message, elapsed());
    }
  }

  /**
   * Relaunches the editor and waits for the bridge to report ready.
   */
  async restart(): Promise<void> {
    const { executable, restartWaitMs, restartPollMs = 2_000 } = this.settings;
    if (!executable) {
      throw new BackendRestartError(this.kind, 'no editor executable configured');
    }

    logger.warn({ service: 'worker', backend: this.kind, executable }, 'restarting backend');
    try {
      await this.runner.launch(executable, []);
    } catch (error) {
      throw new BackendRestartError(
        this.kind,
        error instanceof Error ? error.message : String(error),
      );
    }

    const deadline = Date.now() + restartWaitMs;
    while (Date.now() < deadline) {
      try {
        const status = await this.client.status(AbortSignal.timeout(restartPollMs));
        if (status.ready) {
          logger.info({ service: 'worker', backend: this.kind }, 'backend ready after restart');
          return;
        }
      } catch (error) {
        logger.debug({ service: 'worker', backend: this.kind, error }, 'bridge not up yet');
      }
      await sleep(restartPollMs);
    }
    throw new BackendRestartError(this.kind, `bridge not ready within ${restartWaitMs}ms`);
  }

  private async abortRender(jobId: number): Promise<void> {
    try {
      await this.client.abort(jobId, AbortSignal.timeout(ABORT_REQUEST_TIMEOUT_MS));
    } catch (error) {
      logger.warn({ service: 'worker', job_id: jobId, backend: this.kind, error }, 'render abort request failed');
    }
  }
}
