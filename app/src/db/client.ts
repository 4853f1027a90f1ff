import pg from 'pg';

import { noopLog, type LogFn } from '../utils/logger.js';

const { Pool } = pg;

export type DbPool = pg.Pool;

export interface DbClientOptions {
  connectionString: string;
  maxConnections?: number;
  idleTimeoutMs?: number;
  connectionTimeoutMs?: number;
  log?: LogFn;
}

/**
 * Create a PostgreSQL connection pool for the tabular store.
 *
 * A backup cycle issues one query at a time, so the pool stays small.
 */
export function createDbPool(opts: DbClientOptions): DbPool {
  const log = opts.log ?? noopLog;
  const pool = new Pool({
    connectionString: opts.connectionString,
    max: opts.maxConnections ?? 2,
    idleTimeoutMillis: opts.idleTimeoutMs ?? 10_000,
    connectionTimeoutMillis: opts.connectionTimeoutMs ?? 5_000,
  });

  pool.on('error', (err) => {
    log('error', { event: 'pg_pool_error', message: err.message });
  });

  return pool;
}

/** Drain all connections. */
export async function closeDbPool(pool: DbPool): Promise<void> {
  await pool.end();
}
