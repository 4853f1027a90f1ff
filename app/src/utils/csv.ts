/**
 * Minimal RFC 4180 CSV codec for the sheet exchange files GAM reads and writes.
 *
 * - Fields containing a comma, quote, CR or LF are quoted; quotes are doubled.
 * - Parsing accepts CRLF or LF line endings and quoted multi-line fields.
 * - The first record is the header. Blank trailing lines are ignored.
 * - Short records yield only the columns they have; extra cells are dropped.
 */
import type { TabularRow } from '../types/collaborators.js';

const NEEDS_QUOTING = /[",\r\n]/;

export function escapeCsvField(value: string): string {
  return NEEDS_QUOTING.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

/**
 * Serialise rows under a fixed header. Columns a row lacks become empty cells.
 */
export function toCsv(header: readonly string[], rows: readonly TabularRow[]): string {
  const lines = [header.map(escapeCsvField).join(',')];
  for (const row of rows) {
    lines.push(header.map((column) => escapeCsvField(row[column] ?? '')).join(','));
  }
  return lines.join('\n') + '\n';
}

/** Split CSV text into records of raw cells. */
export function parseCsvRecords(text: string): string[][] {
  const records: string[][] = [];
  let record: string[] = [];
  let field = '';
  let inQuotes = false;
  let i = 0;

  // Strip a UTF-8 BOM (Sheets exports carry one)
  if (text.charCodeAt(0) === 0xfeff) i = 1;

  while (i < text.length) {
    const ch = text[i];

    if (inQuotes) {
      if (ch === '"') {
        if (text[i + 1] === '"') {
          field += '"';
          i += 2;
          continue;
        }
        inQuotes = false;
        i++;
        continue;
      }
      field += ch;
      i++;
      continue;
    }

    if (ch === '"' && field.length === 0) {
      inQuotes = true;
      i++;
    } else if (ch === ',') {
      record.push(field);
      field = '';
      i++;
    } else if (ch === '\n' || ch === '\r') {
      record.push(field);
      records.push(record);
      record = [];
      field = '';
      i += ch === '\r' && text[i + 1] === '\n' ? 2 : 1;
    } else {
      field += ch;
      i++;
    }
  }

  if (field.length > 0 || record.length > 0) {
    record.push(field);
    records.push(record);
  }

  return records.filter((r) => !(r.length === 1 && r[0] === ''));
}

/**
 * Parse CSV text into header-keyed rows.
 */
export function parseCsv(text: string): TabularRow[] {
  const [header, ...records] = parseCsvRecords(text);
  if (!header) return [];
  const columns = header.map((h) => h.trim());

  return records.map((cells) => {
    const row: Record<string, string> = {};
    columns.forEach((column, idx) => {
      const cell = cells[idx];
      if (cell !== undefined) row[column] = cell;
    });
    return row;
  });
}
