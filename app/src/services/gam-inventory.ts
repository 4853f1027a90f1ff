import type { Inventory, InventoryEntry, InventoryTarget } from '../types/collaborators.js';
import { parseCsv } from '../utils/csv.js';
import type { GamCli } from './gam-cli.js';

export const FOLDER_MIME_TYPE = 'application/vnd.google-apps.folder';

/**
 * Inventory over `gam print filelist`.
 *
 * A user target lists the files the user owns; a pool target lists the
 * shared drive's contents as the admin. Each iteration runs GAM once.
 */
export class GamInventory implements Inventory {
  constructor(
    private readonly gam: GamCli,
    private readonly adminUser: string,
  ) {}

  async *listFiles(target: InventoryTarget): AsyncGenerator<InventoryEntry> {
    const stdout =
      target.kind === 'user'
        ? await this.gam.run('list_user_files', [
            'user', target.email,
            'print', 'filelist',
            'fields', 'id,mimetype',
          ])
        : await this.gam.run('list_pool', [
            'user', this.adminUser,
            'print', 'filelist',
            'select', 'shareddriveid', target.driveId,
            'fields', 'id,mimetype',
          ]);

    for (const row of parseCsv(stdout)) {
      const id = row.id ?? '';
      if (!id) continue;
      yield { id, isContainer: (row.mimeType ?? row.mimetype) === FOLDER_MIME_TYPE };
    }
  }
}
