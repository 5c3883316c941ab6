import { Module } from '@nestjs/common';
import { loadApiConfig, ApiConfig } from './config';
import { createPool } from './db';
import { HealthController } from './health.controller';
import { JobsController } from './jobs/jobs.controller';
import { JobsRepository } from './jobs/jobs.repository';
import { JobsService } from './jobs/jobs.service';
import { API_CONFIG, PG_POOL } from './tokens';

@Module({
  controllers: [HealthController, JobsController],
  providers: [
    { provide: API_CONFIG, useFactory: () => loadApiConfig() },
    {
      provide: PG_POOL,
      inject: [API_CONFIG],
      useFactory: (config: ApiConfig) => createPool(config.database),
    },
    JobsService,
    JobsRepository,
  ],
})
export class AppModule {}
