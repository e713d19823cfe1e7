import { Pool, type PoolClient } from 'pg';
import { createLogger } from '@collab/shared';

const logger = createLogger({ name: 'db' });

let pool: Pool | null = null;

export interface PoolOptions {
  connectionString: string;
  maxConnections: number;
}

export function getPool(): Pool {
  if (!pool) throw new Error('Database pool not initialized. Call initPool first.');
  return pool;
}

export function initPool(options: PoolOptions): Pool {
  pool = new Pool({ connectionString: options.connectionString, max: options.maxConnections });
  pool.on('error', (err) => {
    logger.error({ err: err.message }, 'Unexpected database pool error');
  });
  logger.info({ maxConnections: options.maxConnections }, 'Database pool initialized');
  return pool;
}

export async function closePool(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
    logger.info({}, 'Database pool closed');
  }
}

export async function withTransaction<T>(fn: (tx: unknown) => Promise<T>): Promise<T> {
  const client = await getPool().connect();
  try {
    await client.query('BEGIN');
    const result = await fn(client);
    await client.query('COMMIT');
    client.release();
    return result;
  } catch (err) {
    try {
      await client.query('ROLLBACK');
      client.release();
    } catch (rollbackErr) {
      logger.error(
        { err: rollbackErr instanceof Error ? rollbackErr.message : String(rollbackErr) },
        'Rollback failed, discarding connection',
      );
      client.release(true);
    }
    throw err;
  }
}

/** Narrows the opaque transaction handle the domain passes around back to a pg client. */
export function clientOf(tx: unknown): PoolClient {
  if (!isQueryable(tx)) {
    throw new Error('Expected a pg client as transaction handle');
  }
  return tx;
}

function isQueryable(tx: unknown): tx is PoolClient {
  return typeof tx === 'object' && tx !== null && 'query' in tx && typeof tx.query === 'function';
}

export function pgErrorCode(err: unknown): string | undefined {
  return err instanceof Error && 'code' in err && typeof err.code === 'string' ? err.code : undefined;
}

export function toDate(value: unknown): Date {
  return value instanceof Date ? value : new Date(String(value));
}
