import type { TabularRow, TabularStore } from '../types/collaborators.js';

/**
 * In-process TabularStore.
 *
 * Backs tests and dry runs. Rows are copied on the way in and out so callers
 * can never mutate stored state through a reference they hold.
 */
export class InMemoryTabularStore implements TabularStore {
  private readonly sheets = new Map<string, { header: string[]; rows: TabularRow[] }>();

  /** Number of upload() calls, per `resourceId/sheetName`. */
  readonly uploads = new Map<string, number>();

  async download(resourceId: string, sheetName: string): Promise<TabularRow[]> {
    const sheet = this.sheets.get(key(resourceId, sheetName));
    return sheet ? sheet.rows.map((row) => ({ ...row })) : [];
  }

  async upload(
    resourceId: string,
    sheetName: string,
    header: readonly string[],
    rows: readonly TabularRow[],
  ): Promise<void> {
    const k = key(resourceId, sheetName);
    this.sheets.set(k, {
      header: [...header],
      rows: rows.map((row) => projectRow(row, header)),
    });
    this.uploads.set(k, (this.uploads.get(k) ?? 0) + 1);
  }

  /** Seed a sheet directly (test setup). Does not count as an upload. */
  seed(resourceId: string, sheetName: string, rows: readonly TabularRow[]): void {
    const header = rows.length > 0 ? Object.keys(rows[0]) : [];
    this.sheets.set(key(resourceId, sheetName), { header, rows: rows.map((row) => ({ ...row })) });
  }

  header(resourceId: string, sheetName: string): string[] | null {
    const sheet = this.sheets.get(key(resourceId, sheetName));
    return sheet ? [...sheet.header] : null;
  }
}

function key(resourceId: string, sheetName: string): string {
  return `${resourceId}/${sheetName}`;
}

/** Keep only header columns, filling absent ones with ''. */
export function projectRow(row: TabularRow, header: readonly string[]): TabularRow {
  const out: Record<string, string> = {};
  for (const column of header) out[column] = row[column] ?? '';
  return out;
}
