/**
 * Run `fn` inside BEGIN/COMMIT on a dedicated client. Any error rolls back
 * and is re-thrown; a failed ROLLBACK is logged and never masks it. The
 * client is always released.
 */
import type pg from 'pg';

import { errorMessage } from '../utils/error-handler.js';
import { noopLog, type LogFn } from '../utils/logger.js';
import type { DbPool } from './client.js';

export async function withTransaction<T>(
  pool: DbPool,
  fn: (client: pg.PoolClient) => Promise<T>,
  log: LogFn = noopLog,
): Promise<T> {
  const client = await pool.connect();
  try {
    await client.query('BEGIN');
    const result = await fn(client);
    await client.query('COMMIT');
    return result;
  } catch (err) {
    try {
      await client.query('ROLLBACK');
    } catch (rollbackErr) {
      log('error', { event: 'rollback_failed', message: errorMessage(rollbackErr), cause: errorMessage(err) });
    }
    throw err;
  } finally {
    client.release();
  }
}
