import { z } from 'zod';
import { ConfigValidationError } from './errors';

const envSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  PGHOST: z.string().default('localhost'),
  PGPORT: z.coerce.number().int().min(1).max(65535).default(5432),
  PGUSER: z.string().default('app'),
  PGPASSWORD: z.string().default('app'),
  PGDATABASE: z.string().default('app'),
  PG_POOL_MAX: z.coerce.number().int().min(1).default(5),
});

export type ApiConfig = {
  port: number;
  database: {
    host: string;
    port: number;
    user: string;
    password: string;
    database: string;
    max: number;
  };
};

export function loadApiConfig(env: NodeJS.ProcessEnv = process.env): ApiConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigValidationError(
      result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    );
  }
  const e = result.data;
  return {
    port: e.PORT,
    database: {
      host: e.PGHOST,
      port: e.PGPORT,
      user: e.PGUSER,
      password: e.PGPASSWORD,
      database: e.PGDATABASE,
      max: e.PG_POOL_MAX,
    },
  };
}
