import { Pool } from 'pg';

import type { Env } from '../config/env.js';

export interface PoolProvider {
  readonly hasDatabase: boolean;
  getPool(): Pool;
  close(): Promise<void>;
}

/** Opens the pg pool on first use so in-memory runs never touch a database. */
export function createPoolProvider(env: Env): PoolProvider {
  let pool: Pool | null = null;
  const connectionString = env.DATABASE_URL;

  return {
    hasDatabase: typeof connectionString === 'string' && connectionString.length > 0,
    getPool() {
      if (pool !== null) {
        return pool;
      }

      if (typeof connectionString !== 'string' || connectionString.length === 0) {
        throw new Error('DATABASE_URL is not configured.');
      }

      pool = new Pool({ connectionString });
      pool.on('error', (error) => {
        console.error('pg_pool_error', { error: error.message });
      });
      return pool;
    },
    async close() {
      if (pool !== null) {
        await pool.end();
        pool = null;
      }
    }
  };
}
