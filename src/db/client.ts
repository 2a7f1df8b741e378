import pg from 'pg';
import { env } from '../config/env.js';
import { logger } from '../config/logger.js';

let pool: pg.Pool | null = null;

/**
 * The shared pool, created on first use. Only the thank-you store and the
 * migrations need a database, so nothing connects until one of them runs.
 */
export function getPool(): pg.Pool {
  if (pool) {
    return pool;
  }
  if (!env.DATABASE_URL) {
    throw new Error('DATABASE_URL is not set; the thank-you store is disabled');
  }

  pool = new pg.Pool({
    connectionString: env.DATABASE_URL,
    max: 10,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 2000,
  });
  pool.on('error', (err) => {
    logger.error('Unexpected database error', { error: err.message });
  });

  return pool;
}

export async function query<T extends pg.QueryResultRow = pg.QueryResultRow>(
  text: string,
  params?: unknown[]
): Promise<pg.QueryResult<T>> {
  const startedAt = Date.now();
  try {
    const result = await getPool().query<T>(text, params);
    logger.debug('Executed query', { text, duration: Date.now() - startedAt, rows: result.rowCount });
    return result;
  } catch (error) {
    logger.error('Query error', {
      text,
      error: error instanceof Error ? error.message : String(error),
    });
    throw error;
  }
}

export async function getClient(): Promise<pg.PoolClient> {
  return getPool().connect();
}

/**
 * Close the pool if one was opened
 */
export async function disconnect(): Promise<void> {
  if (!pool) {
    return;
  }
  const closing = pool;
  pool = null;
  await closing.end();
  logger.info('Database pool closed');
}
