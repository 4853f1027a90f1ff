/**
 * TabularStore over a Google Sheets spreadsheet, exchanged as CSV via GAM.
 *
 * download: `get drivefile … format csv csvsheet <sheet>` into a private temp
 *           directory, then parse. A sheet that does not exist yields no rows.
 * upload:   write CSV with the given header, then
 *           `update drivefile … localfile <csv> csvsheet <sheet>`.
 * The temp directory is always removed.
 */
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { TransportError } from '../errors.js';
import type { TabularRow, TabularStore } from '../types/collaborators.js';
import { parseCsv, toCsv } from '../utils/csv.js';
import type { GamCli } from './gam-cli.js';

const MISSING_SHEET = /sheet.*not found/i;

export class GamSheetStore implements TabularStore {
  constructor(
    private readonly gam: GamCli,
    private readonly adminUser: string,
  ) {}

  async download(resourceId: string, sheetName: string): Promise<TabularRow[]> {
    return this.withTempDir(async (dir) => {
      const fileName = `${safeFileName(sheetName)}.csv`;
      try {
        await this.gam.run('download_sheet', [
          'user', this.adminUser,
          'get', 'drivefile', resourceId,
          'format', 'csv',
          'csvsheet', sheetName,
          'targetfolder', dir,
          'targetname', fileName,
          'overwrite', 'true',
        ]);
      } catch (err) {
        if (err instanceof TransportError && MISSING_SHEET.test(err.message)) return [];
        throw err;
      }
      return parseCsv(await readFile(join(dir, fileName), 'utf-8'));
    });
  }

  async upload(
    resourceId: string,
    sheetName: string,
    header: readonly string[],
    rows: readonly TabularRow[],
  ): Promise<void> {
    await this.withTempDir(async (dir) => {
      const path = join(dir, `${safeFileName(sheetName)}.csv`);
      await writeFile(path, toCsv(header, rows), 'utf-8');
      await this.gam.run('upload_sheet', [
        'user', this.adminUser,
        'update', 'drivefile', resourceId,
        'localfile', path,
        'csvsheet', sheetName,
        'retainname',
      ]);
    });
  }

  private async withTempDir<T>(fn: (dir: string) => Promise<T>): Promise<T> {
    const dir = await mkdtemp(join(tmpdir(), 'drive-backup-'));
    try {
      return await fn(dir);
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  }
}

function safeFileName(name: string): string {
  return name.replace(/[^a-zA-Z0-9_-]/g, '_');
}
