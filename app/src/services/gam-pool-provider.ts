import { TransportError } from '../errors.js';
import type { PoolProvider, PoolRole } from '../types/collaborators.js';
import { parseCsv } from '../utils/csv.js';
import { noopLog, type LogFn } from '../utils/logger.js';
import type { GamCli } from './gam-cli.js';

/**
 * PoolProvider over Google shared drives, acting as the admin user.
 */
export class GamPoolProvider implements PoolProvider {
  private readonly log: LogFn;

  constructor(
    private readonly gam: GamCli,
    private readonly adminUser: string,
    log?: LogFn,
  ) {
    this.log = log ?? noopLog;
  }

  async createPool(name: string): Promise<string> {
    const stdout = await this.gam.run('create_pool', [
      'user', this.adminUser,
      'create', 'shareddrive', name,
      'returnidonly',
    ]);
    const id = stdout.trim().split(/\r?\n/).pop()?.trim() ?? '';
    if (!id) {
      throw new TransportError('create_pool', `gam create_pool returned no id for ${name}`);
    }
    return id;
  }

  async findPoolByName(name: string): Promise<string | null> {
    const stdout = await this.gam.run('find_pool', [
      'user', this.adminUser,
      'print', 'shareddrives',
      'fields', 'id,name',
    ]);
    const matches = parseCsv(stdout).filter((row) => row.name === name && row.id);
    if (matches.length > 1) {
      this.log('warn', { event: 'pool_name_ambiguous', drive_name: name, matches: matches.length });
    }
    return matches[0]?.id ?? null;
  }

  async setPoolAttribute(poolId: string, attribute: string, value: string): Promise<void> {
    await this.gam.run('set_pool_attribute', [
      'user', this.adminUser,
      'update', 'shareddrive', poolId,
      attribute, value,
    ]);
  }

  async grantRole(poolId: string, identity: string, role: PoolRole): Promise<void> {
    await this.gam.run('grant_role', [
      'user', this.adminUser,
      'add', 'drivefileacl', poolId,
      'user', identity,
      'role', role,
    ]);
  }
}
