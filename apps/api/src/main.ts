import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import type { Pool } from 'pg';
import { logger, onShutdown } from '@reelqueue/shared';
import { AppModule } from './app.module';
import type { ApiConfig } from './config';
import { API_CONFIG, PG_POOL } from './tokens';

async function bootstrap() {
  const app = await NestFactory.create(AppModule, { logger: false });
  const config = app.get<ApiConfig>(API_CONFIG);
  const pool = app.get<Pool>(PG_POOL);

  await app.listen(config.port);
  logger.info({ service: 'api', port: config.port }, 'api listening');

  onShutdown(async (signal) => {
    logger.info({ service: 'api', signal }, 'api stopping');
    await app.close();
    await pool.end();
  });
}

bootstrap().catch((err) => {
  console.error(err);
  process.exit(1);
});
