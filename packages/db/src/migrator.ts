import { readdir, readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { Pool, type PoolClient } from 'pg';
import { createLogger, loadConfig, DatabaseConfigSchema } from '@collab/shared';

const logger = createLogger({ name: 'db:migrate' });

export const MIGRATIONS_DIR = join(__dirname, '..', 'migrations');

/** Applies every pending `.sql` file in name order, each in its own transaction. */
export async function applyMigrations(client: PoolClient, dir: string = MIGRATIONS_DIR): Promise<string[]> {
  await client.query(`
    CREATE TABLE IF NOT EXISTS _migrations (
      name VARCHAR(255) PRIMARY KEY,
      applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    )
  `);

  const applied = await client.query('SELECT name FROM _migrations ORDER BY name');
  const appliedSet = new Set(applied.rows.map((r: { name: string }) => r.name));

  const files = (await readdir(dir)).filter((f) => f.endsWith('.sql')).sort();
  const newlyApplied: string[] = [];

  for (const file of files) {
    if (appliedSet.has(file)) continue;

    const sql = await readFile(join(dir, file), 'utf-8');

    await client.query('BEGIN');
    try {
      await client.query(sql);
      await client.query('INSERT INTO _migrations (name) VALUES ($1)', [file]);
      await client.query('COMMIT');
    } catch (err) {
      await client.query('ROLLBACK');
      throw err;
    }
    logger.info({ migration: file }, 'Applied migration');
    newlyApplied.push(file);
  }

  return newlyApplied;
}

async function main() {
  const config = loadConfig(DatabaseConfigSchema);
  const pool = new Pool({ connectionString: config.DATABASE_URL, max: 1 });
  const client = await pool.connect();

  try {
    const applied = await applyMigrations(client);
    logger.info({ count: applied.length }, 'All migrations applied');
  } finally {
    client.release();
    await pool.end();
  }
}

if (require.main === module) {
  main().catch((err) => {
    logger.fatal({ err: err instanceof Error ? err.message : String(err) }, 'Migration failed');
    process.exit(1);
  });
}
