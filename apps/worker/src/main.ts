import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import type { Pool } from 'pg';
import { logger, onShutdown } from '@reelqueue/shared';
import { AppModule } from './app.module';
import { DispatcherService } from './dispatcher/dispatcher.service';
import { PG_POOL } from './tokens';

async function bootstrap() {
  const app = await NestFactory.createApplicationContext(AppModule, {
    logger: false,
  });

  const dispatcher = app.get(DispatcherService);
  const pool = app.get<Pool | null>(PG_POOL);

  onShutdown(async (signal) => {
    logger.info({ service: 'worker', signal }, 'worker stopping');
    await dispatcher.stop();
    await app.close();
    await pool?.end();
    logger.info({ service: 'worker' }, 'worker stopped');
  });
}

bootstrap().catch((err) => {
  console.error(err);
  process.exit(1);
});
