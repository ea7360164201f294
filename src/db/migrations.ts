import { createHash } from 'node:crypto';
import { readdir, readFile } from 'node:fs/promises';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

import type { Pool } from 'pg';

export interface MigrationFile {
  filename: string;
  sql: string;
  checksum: string;
}

export const DEFAULT_MIGRATIONS_DIRECTORY = fileURLToPath(new URL('../../migrations', import.meta.url));

export function checksumSql(sql: string): string {
  return createHash('sha256').update(sql).digest('hex');
}

export async function readMigrationFiles(directory: string = DEFAULT_MIGRATIONS_DIRECTORY): Promise<MigrationFile[]> {
  const filenames = (await readdir(directory))
    .filter((file) => file.endsWith('.sql'))
    .sort((left, right) => left.localeCompare(right));

  const migrations: MigrationFile[] = [];
  for (const filename of filenames) {
    const sql = await readFile(path.join(directory, filename), 'utf8');
    migrations.push({ filename, sql, checksum: checksumSql(sql) });
  }

  return migrations;
}

/**
 * Returns the migrations still to apply, in order. An applied migration whose
 * file changed since is an error: migrations are append-only.
 */
export function planMigrations(files: readonly MigrationFile[], applied: ReadonlyMap<string, string>): MigrationFile[] {
  const pending: MigrationFile[] = [];

  for (const migration of files) {
    const appliedChecksum = applied.get(migration.filename);
    if (appliedChecksum === undefined) {
      pending.push(migration);
      continue;
    }

    if (appliedChecksum !== migration.checksum) {
      throw new Error(`Checksum mismatch for migration ${migration.filename}; it changed after being applied.`);
    }
  }

  return pending;
}

export async function loadAppliedMigrations(pool: Pool): Promise<Map<string, string>> {
  await pool.query(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      filename TEXT PRIMARY KEY,
      checksum TEXT NOT NULL,
      executed_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    )
  `);

  const result = await pool.query<{ filename: string; checksum: string }>('SELECT filename, checksum FROM schema_migrations');
  return new Map(result.rows.map((row) => [row.filename, row.checksum]));
}

export async function applyMigration(pool: Pool, migration: MigrationFile): Promise<void> {
  const client = await pool.connect();

  try {
    await client.query('BEGIN');
    await client.query(migration.sql);
    await client.query('INSERT INTO schema_migrations (filename, checksum) VALUES ($1, $2)', [
      migration.filename,
      migration.checksum
    ]);
    await client.query('COMMIT');
  } catch (error) {
    await client.query('ROLLBACK');
    throw error;
  } finally {
    client.release();
  }
}
