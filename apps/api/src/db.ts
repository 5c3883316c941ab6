import { Pool } from 'pg';
import type { ApiConfig } from './config';

export function createPool(config: ApiConfig['database']): Pool {
  return new Pool(config);
}
