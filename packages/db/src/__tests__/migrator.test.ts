import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { applyMigrations, MIGRATIONS_DIR } from '../migrator';
import { clientOf } from '../client';
import { fakeClient, rows, affected } from './fake-client';

describe('applyMigrations', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'collab-migrations-'));
    writeFileSync(join(dir, '002_second.sql'), 'SELECT 2;');
    writeFileSync(join(dir, '001_first.sql'), 'SELECT 1;');
    writeFileSync(join(dir, 'README.md'), 'not a migration');
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('applies pending files in name order and skips applied ones', async () => {
    const fake = fakeClient(affected(0), rows({ name: '001_first.sql' }));

    const applied = await applyMigrations(clientOf(fake), dir);

    expect(applied).toEqual(['002_second.sql']);
    const statements = fake.query.mock.calls.map(([sql]) => sql.trim());
    expect(statements.slice(2)).toEqual([
      'BEGIN',
      'SELECT 2;',
      'INSERT INTO _migrations (name) VALUES ($1)',
      'COMMIT',
    ]);
  });

  it('rolls back and rethrows when a migration fails', async () => {
    const fake = fakeClient(affected(0), rows(), affected(0), new Error('syntax error'));

    await expect(applyMigrations(clientOf(fake), dir)).rejects.toThrow('syntax error');
    expect(fake.query).toHaveBeenLastCalledWith('ROLLBACK');
  });

  it('ships the initial schema', async () => {
    const fake = fakeClient(affected(0), rows());

    const applied = await applyMigrations(clientOf(fake), MIGRATIONS_DIR);

    expect(applied).toEqual(['001_initial.sql']);
  });
});
