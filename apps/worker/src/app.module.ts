import { Module } from '@nestjs/common';
import { S3Client } from '@aws-sdk/client-s3';
import type { Pool } from 'pg';
import { loadWorkerConfig, WorkerConfig } from './config';
import { applySchema, createPool } from './db';
import { AiUpscalerAdapter } from './backends/ai-upscaler.adapter';
import { BackendRegistry } from './backends/backend.registry';
import { EditorAutomationAdapter } from './backends/editor-automation.adapter';
import { EditorBridgeClient } from './backends/editor-bridge.client';
import { SpawnProcessRunner } from './backends/process-runner';
import { TranscoderAdapter } from './backends/transcoder.adapter';
import { TapeDetector } from './backends/tape-detector';
import { DispatcherService } from './dispatcher/dispatcher.service';
import { NodeEnvironmentProbes } from './environment/environment-probes';
import { EnvironmentDetector } from './environment/environment.detector';
import { EnvironmentMonitor } from './environment/environment.monitor';
import type { ProfileSource } from './environment/environment.types';
import { InMemoryJobQueue } from './jobs/in-memory-job.queue';
import type { JobQueue } from './jobs/job.queue';
import { PgJobQueue } from './jobs/pg-job.queue';
import { RetentionService } from './maintenance/retention.service';
import { RetryPolicy } from './retry/retry.policy';
import { JOB_QUEUE, PG_POOL, PROFILE_SOURCE, UPLOADER, WORKER_CONFIG } from './tokens';
import { S3Uploader } from './upload/s3.uploader';
import { DisabledUploader, Uploader } from './upload/uploader.types';

@Module({
  controllers: [],
  providers: [
    { provide: WORKER_CONFIG, useFactory: () => loadWorkerConfig() },
    {
      provide: PG_POOL,
      inject: [WORKER_CONFIG],
      useFactory: (config: WorkerConfig): Pool | null =>
        config.queueDriver === 'postgres' ? createPool() : null,
    },
    {
      provide: JOB_QUEUE,
      inject: [WORKER_CONFIG, PG_POOL],
      useFactory: async (config: WorkerConfig, pool: Pool | null): Promise<JobQueue> => {
        if (!pool) {
          return new InMemoryJobQueue();
        }
        if (config.applySchema) {
          await applySchema(pool, config.schemaFile);
        }
        return new PgJobQueue(pool);
      },
    },
    {
      provide: PROFILE_SOURCE,
      inject: [WORKER_CONFIG],
      useFactory: (config: WorkerConfig): ProfileSource => {
        const probes = new NodeEnvironmentProbes({
          transcoderPath: config.transcoder.path,
          probeHost: config.environment.probeHost,
          probePort: config.environment.probePort,
          probeTimeoutMs: config.environment.probeTimeoutMs,
          accelerationOrder: config.environment.accelerationOrder,
        });
        return new EnvironmentMonitor(
          new EnvironmentDetector(probes, config.environment),
          config.environment.refreshIntervalMs,
        );
      },
    },
    {
      provide: RetryPolicy,
      inject: [WORKER_CONFIG],
      useFactory: (config: WorkerConfig) =>
        new RetryPolicy({
          retry: config.retry,
          backends: config.backends,
          upload: config.upload,
        }),
    },
    {
      provide: BackendRegistry,
      inject: [WORKER_CONFIG, PROFILE_SOURCE],
      useFactory: (config: WorkerConfig, profiles: ProfileSource) => {
        const runner = new SpawnProcessRunner();
        const detector = new TapeDetector(runner, config.tapeDetection);
        const { outputDir } = config;
        return new BackendRegistry(
          [
            new TranscoderAdapter(runner, profiles, detector, { ...config.transcoder, outputDir }),
            new EditorAutomationAdapter(
              new EditorBridgeClient(config.editor.bridgeUrl),
              runner,
              { ...config.editor, outputDir },
            ),
            new AiUpscalerAdapter(runner, detector, { ...config.upscaler, outputDir }),
          ],
          config.backends,
        );
      },
    },
    {
      provide: UPLOADER,
      inject: [WORKER_CONFIG, RetryPolicy, PROFILE_SOURCE],
      useFactory: (
        config: WorkerConfig,
        policy: RetryPolicy,
        profiles: ProfileSource,
      ): Uploader => {
        const { upload } = config;
        if (!upload.enabled || !upload.bucket) {
          return new DisabledUploader();
        }
        const client = new S3Client({
          region: upload.region,
          endpoint: upload.endpoint,
          forcePathStyle: upload.endpoint !== undefined,
          credentials: upload.credentials,
        });
        return new S3Uploader(client, policy, profiles, {
          bucket: upload.bucket,
          prefix: upload.prefix,
        });
      },
    },
    {
      provide: RetentionService,
      inject: [WORKER_CONFIG, JOB_QUEUE],
      useFactory: (config: WorkerConfig, queue: JobQueue) =>
        new RetentionService(queue, config.retention),
    },
    DispatcherService,
  ],
})
export class AppModule {}
