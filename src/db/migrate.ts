import 'dotenv/config';

import { parseArgs } from 'node:util';

import { getEnv } from '../config/env.js';
import { applyMigration, loadAppliedMigrations, planMigrations, readMigrationFiles } from './migrations.js';
import { createPoolProvider } from './pool-provider.js';

async function run(): Promise<void> {
  const { values } = parseArgs({
    options: {
      'dry-run': { type: 'boolean', default: false },
      dir: { type: 'string' }
    }
  });

  const env = getEnv();
  const pools = createPoolProvider(env);
  if (!pools.hasDatabase) {
    throw new Error('DATABASE_URL must be configured to run migrations.');
  }

  const files = await readMigrationFiles(values.dir);

  try {
    const pool = pools.getPool();
    const pending = planMigrations(files, await loadAppliedMigrations(pool));

    if (pending.length === 0) {
      console.log('migrations_up_to_date', { known: files.length });
      return;
    }

    for (const migration of pending) {
      if (values['dry-run'] === true) {
        console.log('migration_pending', { filename: migration.filename });
        continue;
      }

      await applyMigration(pool, migration);
      console.log('migration_applied', { filename: migration.filename });
    }
  } finally {
    await pools.close();
  }
}

run().catch((error: unknown) => {
  console.error('migration_failed', { error: error instanceof Error ? error.message : String(error) });
  process.exit(1);
});
