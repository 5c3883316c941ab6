import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { Pool } from 'pg';
import { logger } from '@reelqueue/shared';

export function createPool(env: NodeJS.ProcessEnv = process.env): Pool {
  return new Pool({
    host: env.PGHOST ?? 'localhost',
    port: Number(env.PGPORT ?? 5432),
    user: env.PGUSER ?? 'app',
    password: env.PGPASSWORD ?? 'app',
    database: env.PGDATABASE ?? 'app',
    max: 5,
  });
}

/**
 * Runs the DDL file against the pool. Statements are idempotent, so this is
 * safe on every boot.
 */
export async function applySchema(pool: Pick<Pool, 'query'>, schemaFile: string): Promise<void> {
  const path = resolve(schemaFile);
  const sql = await readFile(path, 'utf8');
  await pool.query(sql);
  logger.info({ service: 'worker', schema_file: path }, 'schema applied');
}
