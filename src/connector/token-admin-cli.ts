import 'dotenv/config';

import { getEnv } from '../config/env.js';
import { createPoolProvider } from '../db/pool-provider.js';
import { PostgresApiLogRepository } from '../repositories/postgres-api-log-repository.js';
import { PostgresServiceTokenRepository } from '../repositories/postgres-service-token-repository.js';
import { ApiLogService } from '../services/api-log-service.js';
import { ServiceTokenService } from '../services/service-token-service.js';
import { runTokenAdminCommand } from './token-admin.js';

async function run(): Promise<void> {
  const pools = createPoolProvider(getEnv());
  if (!pools.hasDatabase) {
    throw new Error('DATABASE_URL must be configured to administer service tokens.');
  }

  try {
    const pool = pools.getPool();
    await runTokenAdminCommand(
      process.argv.slice(2),
      {
        serviceTokens: new ServiceTokenService(new PostgresServiceTokenRepository(pool)),
        apiLog: new ApiLogService(new PostgresApiLogRepository(pool))
      },
      (line) => {
        process.stdout.write(`${line}\n`);
      }
    );
  } finally {
    await pools.close();
  }
}

run().catch((error: unknown) => {
  process.stderr.write(`${error instanceof Error ? error.message : String(error)}\n`);
  process.exit(1);
});
