import { describe, expect, it } from 'vitest';

import { checksumSql, planMigrations, readMigrationFiles, type MigrationFile } from '../../src/db/migrations.js';

function migration(filename: string, sql: string): MigrationFile {
  return { filename, sql, checksum: checksumSql(sql) };
}

describe('migrations', () => {
  it('plans only the migrations not applied yet, in order', () => {
    const files = [migration('001_a.sql', 'SELECT 1;'), migration('002_b.sql', 'SELECT 2;')];

    const pending = planMigrations(files, new Map([['001_a.sql', checksumSql('SELECT 1;')]]));

    expect(pending.map((file) => file.filename)).toEqual(['002_b.sql']);
  });

  it('refuses to run when an applied migration was edited', () => {
    const files = [migration('001_a.sql', 'SELECT 10;')];

    expect(() => planMigrations(files, new Map([['001_a.sql', checksumSql('SELECT 1;')]]))).toThrow(
      'Checksum mismatch for migration 001_a.sql; it changed after being applied.'
    );
  });

  it('reads the bundled schema migration', async () => {
    const files = await readMigrationFiles();

    expect(files[0]?.filename).toBe('001_initial_schema.sql');
    expect(files[0]?.sql).toContain('CREATE TABLE');
  });
});
