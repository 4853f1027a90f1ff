/**
 * Forward-only SQL migrations.
 *
 * Applies `migrations/NNN_*.sql` in numeric order, each in its own
 * transaction, and records it in `_migrations` with a checksum. Runs under
 * a session advisory lock so two cycles starting together cannot race.
 * Re-running is a no-op; an applied file whose checksum changed is reported
 * as a warning, never re-applied.
 */
import { createHash } from 'node:crypto';
import { readdir, readFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';

import type { DbPool } from './client.js';

const MIGRATIONS_DIR = join(dirname(fileURLToPath(import.meta.url)), 'migrations');
const LOCK_TIMEOUT_MS = 30_000;

export interface MigrationResult {
  applied: string[];
  skipped: string[];
  total: number;
  warnings: string[];
}

/** 31-bit positive advisory lock id derived from a name. */
export function computeLockId(name: string): number {
  const hash = createHash('sha256').update(name).digest();
  return hash.readUInt32BE(0) & 0x7fffffff;
}

export const MIGRATION_LOCK_ID = computeLockId('drive-backup:migration');

function computeChecksum(content: string): string {
  return createHash('sha256').update(content).digest('hex');
}

/** SQL files sorted by their numeric prefix. */
export function sortMigrationFiles(files: readonly string[]): string[] {
  return files
    .filter((f) => f.endsWith('.sql'))
    .sort((a, b) => parseInt(a.split('_')[0], 10) - parseInt(b.split('_')[0], 10));
}

export async function migrate(pool: DbPool, migrationsDir = MIGRATIONS_DIR): Promise<MigrationResult> {
  const result: MigrationResult = { applied: [], skipped: [], total: 0, warnings: [] };

  const lockClient = await pool.connect();
  try {
    await lockClient.query(`SELECT set_config('lock_timeout', $1, false)`, [`${LOCK_TIMEOUT_MS}ms`]);
    await lockClient.query('SELECT pg_advisory_lock($1)', [MIGRATION_LOCK_ID]);
  } catch (err) {
    lockClient.release();
    throw new Error(
      `Failed to acquire migration lock within ${LOCK_TIMEOUT_MS}ms: ${err instanceof Error ? err.message : String(err)}`,
    );
  }

  try {
    await lockClient.query("SET lock_timeout = '0'");
    await pool.query(`
      CREATE TABLE IF NOT EXISTS _migrations (
        id SERIAL PRIMARY KEY,
        filename TEXT NOT NULL UNIQUE,
        checksum TEXT NOT NULL,
        applied_at TIMESTAMPTZ NOT NULL DEFAULT now()
      );
    `);

    const appliedRows = await pool.query<{ filename: string; checksum: string }>(
      'SELECT filename, checksum FROM _migrations ORDER BY id',
    );
    const applied = new Map(appliedRows.rows.map((row) => [row.filename, row.checksum]));

    const files = sortMigrationFiles(await readdir(migrationsDir));
    result.total = files.length;

    for (const filename of files) {
      const content = await readFile(join(migrationsDir, filename), 'utf-8');
      const checksum = computeChecksum(content);

      const existing = applied.get(filename);
      if (existing !== undefined) {
        if (existing !== checksum) {
          result.warnings.push(`Checksum mismatch for ${filename}: migration file has changed after application.`);
        }
        result.skipped.push(filename);
        continue;
      }

      const client = await pool.connect();
      try {
        await client.query('BEGIN');
        await client.query(content);
        await client.query('INSERT INTO _migrations (filename, checksum) VALUES ($1, $2)', [filename, checksum]);
        await client.query('COMMIT');
        result.applied.push(filename);
      } catch (err) {
        await client.query('ROLLBACK').catch(() => undefined);
        throw new Error(`Migration ${filename} failed: ${err instanceof Error ? err.message : String(err)}`);
      } finally {
        client.release();
      }
    }

    return result;
  } finally {
    await lockClient.query('SELECT pg_advisory_unlock($1)', [MIGRATION_LOCK_ID]).catch(() => undefined);
    lockClient.release();
  }
}
