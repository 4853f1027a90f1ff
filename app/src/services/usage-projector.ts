/**
 * Usage Projector — Current and Projected Occupancy of the Active Pool
 *
 * Measures the active pool (items, folders), probes every pending user's
 * drive, and projects occupancy after those users are copied in. Two
 * percentages against the configured hard limits drive the rotation decision.
 *
 * Degradation:
 *   - a per-user probe failure contributes zero and is reported, never fatal
 *   - failure to list the active pool itself yields UNKNOWN_PERCENT (−1) for
 *     both percentages; callers must not act on an unknown projection
 *
 * Rounding: percent = round(projected / limit × 100, PERCENT_DECIMALS).
 */
import { TransportError } from '../errors.js';
import {
  UNKNOWN_PERCENT,
  type PoolRecord,
  type UsageCount,
  type UsageLimits,
  type UsageProjection,
} from '../types/backup.js';
import type { Inventory, InventoryEntry, InventoryTarget } from '../types/collaborators.js';
import { errorMessage } from '../utils/error-handler.js';
import { noopLog, type LogFn } from '../utils/logger.js';

export const PERCENT_DECIMALS = 2;

export interface ProbeFailure {
  readonly email: string;
  readonly message: string;
}

export interface ProjectionResult {
  readonly projection: UsageProjection;
  /** Set when the active pool could not be measured (projection is unknown). */
  readonly poolError: string | null;
  readonly failedProbes: readonly ProbeFailure[];
  readonly pendingUsers: number;
}

export interface UsageProjectorOptions {
  readonly limits: UsageLimits;
  readonly log?: LogFn;
}

// ---------------------------------------------------------------------------
// Pure helpers
// ---------------------------------------------------------------------------

export function roundPercent(value: number): number {
  const scale = 10 ** PERCENT_DECIMALS;
  return Math.round(value * scale) / scale;
}

export function toPercent(count: number, limit: number): number {
  return roundPercent((count / limit) * 100);
}

export function isUnknownProjection(projection: UsageProjection): boolean {
  return projection.itemPercent === UNKNOWN_PERCENT || projection.folderPercent === UNKNOWN_PERCENT;
}

/**
 * Project occupancy after adding every pending contribution to the current
 * pool counts.
 */
export function projectUsage(
  current: UsageCount,
  pending: readonly UsageCount[],
  limits: UsageLimits,
): UsageProjection {
  let projectedItems = current.items;
  let projectedFolders = current.folders;
  for (const contribution of pending) {
    projectedItems += contribution.items;
    projectedFolders += contribution.folders;
  }

  return {
    currentItems: current.items,
    currentFolders: current.folders,
    projectedItems,
    projectedFolders,
    itemPercent: toPercent(projectedItems, limits.itemLimit),
    folderPercent: toPercent(projectedFolders, limits.folderLimit),
  };
}

export function unknownProjection(): UsageProjection {
  return {
    currentItems: 0,
    currentFolders: 0,
    projectedItems: 0,
    projectedFolders: 0,
    itemPercent: UNKNOWN_PERCENT,
    folderPercent: UNKNOWN_PERCENT,
  };
}

/** Drain an inventory listing into item/folder counts. */
export async function countEntries(entries: AsyncIterable<InventoryEntry>): Promise<UsageCount> {
  let items = 0;
  let folders = 0;
  for await (const entry of entries) {
    items++;
    if (entry.isContainer) folders++;
  }
  return { items, folders };
}

// ---------------------------------------------------------------------------
// UsageProjector
// ---------------------------------------------------------------------------

export class UsageProjector {
  private readonly limits: UsageLimits;
  private readonly log: LogFn;

  constructor(
    private readonly inventory: Inventory,
    opts: UsageProjectorOptions,
  ) {
    this.limits = opts.limits;
    this.log = opts.log ?? noopLog;
  }

  /**
   * Count the active pool's contents.
   * @throws TransportError when the listing fails
   */
  async measurePool(driveId: string): Promise<UsageCount> {
    return this.count({ kind: 'pool', driveId }, 'list_pool');
  }

  /**
   * Count one user's drive.
   * @throws TransportError when the listing fails
   */
  async probeUser(email: string): Promise<UsageCount> {
    return this.count({ kind: 'user', email }, 'list_user_files');
  }

  /**
   * Measure the active pool and project it after the pending users.
   * Users are probed one at a time, in the order given.
   */
  async project(activePool: PoolRecord, pending: readonly { readonly email: string }[]): Promise<ProjectionResult> {
    const emails = [...new Set(pending.map((user) => user.email))];

    let current: UsageCount;
    try {
      current = await this.measurePool(activePool.driveId);
    } catch (err) {
      const message = errorMessage(err);
      this.log('error', {
        event: 'pool_measure_failed',
        drive_id: activePool.driveId,
        drive_name: activePool.driveName,
        message,
      });
      return {
        projection: unknownProjection(),
        poolError: message,
        failedProbes: [],
        pendingUsers: emails.length,
      };
    }

    const contributions: UsageCount[] = [];
    const failedProbes: ProbeFailure[] = [];
    for (const email of emails) {
      try {
        contributions.push(await this.probeUser(email));
      } catch (err) {
        const message = errorMessage(err);
        failedProbes.push({ email, message });
        this.log('warn', { event: 'user_probe_failed', email, message });
      }
    }

    const projection = projectUsage(current, contributions, this.limits);
    this.log('info', {
      event: 'usage_projected',
      drive_name: activePool.driveName,
      pending_users: emails.length,
      failed_probes: failedProbes.length,
      ...projection,
    });

    return { projection, poolError: null, failedProbes, pendingUsers: emails.length };
  }

  private async count(target: InventoryTarget, operation: string): Promise<UsageCount> {
    try {
      return await countEntries(this.inventory.listFiles(target));
    } catch (err) {
      if (err instanceof TransportError) throw err;
      throw new TransportError(operation, errorMessage(err), { cause: err });
    }
  }
}
