/**
 * PostgreSQL-backed TabularStore.
 *
 * Each sheet is the ordered set of `tabular_rows` under (resource_id,
 * sheet_name). upload() replaces the whole sheet in one transaction, so a
 * reader sees either the old rows or the new ones, never a mix.
 */
import type { DbPool } from '../db/client.js';
import { withTransaction } from '../db/transaction.js';
import { TransportError } from '../errors.js';
import type { TabularRow, TabularStore } from '../types/collaborators.js';
import { errorMessage } from '../utils/error-handler.js';
import { noopLog, type LogFn } from '../utils/logger.js';
import { projectRow } from './tabular-store.js';

export class PgTabularStore implements TabularStore {
  constructor(
    private readonly pool: DbPool,
    private readonly log: LogFn = noopLog,
  ) {}

  async download(resourceId: string, sheetName: string): Promise<TabularRow[]> {
    try {
      const result = await this.pool.query<{ data: unknown }>(
        `SELECT data FROM tabular_rows
         WHERE resource_id = $1 AND sheet_name = $2
         ORDER BY row_index`,
        [resourceId, sheetName],
      );
      return result.rows.map((row) => toTabularRow(row.data));
    } catch (err) {
      throw new TransportError('download_sheet', `Failed to read ${sheetName}: ${errorMessage(err)}`, { cause: err });
    }
  }

  async upload(
    resourceId: string,
    sheetName: string,
    header: readonly string[],
    rows: readonly TabularRow[],
  ): Promise<void> {
    const payload = JSON.stringify(rows.map((row) => projectRow(row, header)));
    try {
      await withTransaction(this.pool, async (client) => {
        await client.query('DELETE FROM tabular_rows WHERE resource_id = $1 AND sheet_name = $2', [
          resourceId,
          sheetName,
        ]);
        if (rows.length === 0) return;
        await client.query(
          `INSERT INTO tabular_rows (resource_id, sheet_name, row_index, data)
           SELECT $1, $2, (t.ord - 1)::int, t.value
           FROM jsonb_array_elements($3::jsonb) WITH ORDINALITY AS t(value, ord)`,
          [resourceId, sheetName, payload],
        );
      }, this.log);
    } catch (err) {
      throw new TransportError('upload_sheet', `Failed to write ${sheetName}: ${errorMessage(err)}`, { cause: err });
    }
  }
}

/** Narrow a JSONB value to a row; non-string scalars are stringified. */
function toTabularRow(value: unknown): TabularRow {
  const row: Record<string, string> = {};
  if (typeof value !== 'object' || value === null) return row;
  for (const [column, cell] of Object.entries(value)) {
    if (typeof cell === 'string') row[column] = cell;
    else if (typeof cell === 'number' || typeof cell === 'boolean') row[column] = String(cell);
  }
  return row;
}
