import { execFile as execFileRaw } from 'node:child_process';
import { promisify } from 'node:util';

import { TransportError } from '../errors.js';
import type { PlannedUser, PoolRecord } from '../types/backup.js';
import type { DriveCopier } from '../types/collaborators.js';
import { noopLog, type LogFn } from '../utils/logger.js';

const execFile = promisify(execFileRaw);

/**
 * Runs an operator-supplied copy command once per admitted user:
 * `<command> <email> <driveId>`. A non-zero exit is a failed copy.
 */
export class CommandDriveCopier implements DriveCopier {
  private readonly log: LogFn;

  constructor(
    private readonly command: string,
    log?: LogFn,
  ) {
    this.log = log ?? noopLog;
  }

  async copyUser(user: PlannedUser, pool: PoolRecord): Promise<void> {
    const start = Date.now();
    try {
      await execFile(this.command, [user.email, pool.driveId], { encoding: 'utf8', maxBuffer: 64 * 1024 * 1024 });
    } catch (err) {
      const exitCode = err instanceof Error && 'code' in err && typeof err.code === 'number' ? err.code : null;
      throw new TransportError('copy_user', `Copy of ${user.email} into ${pool.driveName} failed`, {
        exitCode,
        cause: err,
        details: { email: user.email },
      });
    }
    this.log('info', {
      event: 'user_copied',
      email: user.email,
      drive_name: pool.driveName,
      estimated_minutes: user.estimatedMinutes,
      elapsed_ms: Date.now() - start,
    });
  }
}
