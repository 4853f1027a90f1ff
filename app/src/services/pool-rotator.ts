/**
 * Pool Rotator — Threshold-Driven Replacement of the Active Backup Pool
 *
 * State: Active(pool). When the projected item or folder percentage reaches
 * the threshold, the rotator moves to Active(newPool) by running an ordered
 * step sequence:
 *
 *   1. provisionPool   — adopt a pool already named like the successor, else create it;
 *                        apply configured attributes
 *   2. freezePrevious  — mark every active record full
 *   3. registerPool    — append the successor as the only active record
 *   4. persistRegistry — write the full registry back
 *   5. grantAccess     — grant organizer on the new pool to every admin
 *
 * A failing step aborts the sequence, alerts, and reports the step. Nothing is
 * persisted before step 4, so a failure in 1–4 leaves the stored registry in
 * its prior Active state. A pool created in step 1 but never registered is
 * found by name on the next run and adopted instead of duplicated.
 *
 * Invariant: after a successful rotation exactly one record has isFull=false.
 */
import { BackupError, StateInvariantViolation, TransportError } from '../errors.js';
import type { PoolRecord, UsageProjection } from '../types/backup.js';
import type { Alerting, PoolProvider } from '../types/collaborators.js';
import { errorMessage } from '../utils/error-handler.js';
import { noopLog, type LogFn } from '../utils/logger.js';
import { PoolLifecycleMachine, assertTransition, poolState } from './state-machine.js';
import { isUnknownProjection } from './usage-projector.js';
import type { UsageStore } from './usage-store.js';

/** Default projected percentage at which the active pool is rotated. */
export const DEFAULT_ROTATION_THRESHOLD = 80;

export type RotationStepName =
  | 'provisionPool'
  | 'freezePrevious'
  | 'registerPool'
  | 'persistRegistry'
  | 'grantAccess';

/** A single step of the rotation sequence. */
interface RotationStep {
  readonly name: RotationStepName;
  execute(): Promise<void>;
}

export interface RotationResult {
  readonly status: 'skipped' | 'rotated' | 'failed';
  readonly previousPool: PoolRecord;
  /** The successor pool, once registered in memory. */
  readonly newPool?: PoolRecord;
  /** True when step 1 found an already provisioned, unregistered pool. */
  readonly adopted?: boolean;
  readonly failedStep?: RotationStepName;
  readonly error?: string;
  readonly registryPersisted: boolean;
  /** The registry as it now stands in the store. */
  readonly registry: readonly PoolRecord[];
}

export interface PoolRotatorOptions {
  readonly baseName: string;
  readonly admins: readonly string[];
  readonly poolAttributes?: Readonly<Record<string, string>>;
  readonly thresholdPercent?: number;
  readonly log?: LogFn;
  readonly now?: () => Date;
}

// ---------------------------------------------------------------------------
// Pure helpers
// ---------------------------------------------------------------------------

/**
 * Rotation fires iff max(itemPercent, folderPercent) ≥ threshold.
 * An unknown projection never fires.
 */
export function shouldRotate(projection: UsageProjection, thresholdPercent = DEFAULT_ROTATION_THRESHOLD): boolean {
  if (isUnknownProjection(projection)) return false;
  return Math.max(projection.itemPercent, projection.folderPercent) >= thresholdPercent;
}

/**
 * The single active pool of a registry.
 * @throws StateInvariantViolation when zero or several records are active
 */
export function findActivePool(registry: readonly PoolRecord[]): PoolRecord {
  const active = registry.filter((record) => !record.isFull);
  if (active.length !== 1) {
    throw new StateInvariantViolation(
      active.length === 0
        ? 'Pool registry has no active pool'
        : `Pool registry has ${active.length} active pools: ${active.map((r) => r.driveName).join(', ')}`,
      active.length,
      { pools: active.map((r) => r.driveName) },
    );
  }
  return active[0];
}

/**
 * Sequence number encoded in a pool name: `base` → 1, `base7` → 7.
 * Null for names outside the sequence.
 */
export function poolSuffix(baseName: string, driveName: string): number | null {
  if (driveName === baseName) return 1;
  if (!driveName.startsWith(baseName)) return null;
  const rest = driveName.slice(baseName.length);
  if (!/^[1-9]\d*$/.test(rest)) return null;
  return Number(rest);
}

/**
 * Next name in the sequence `base`, `base2`, `base3`, … — one past the
 * highest suffix present. An empty sequence starts at `base`.
 */
export function nextPoolName(baseName: string, existingNames: readonly string[]): string {
  let highest = 0;
  for (const name of existingNames) {
    const suffix = poolSuffix(baseName, name);
    if (suffix !== null && suffix > highest) highest = suffix;
  }
  return highest === 0 ? baseName : `${baseName}${highest + 1}`;
}

/** Mark every active record full, validating each lifecycle transition. */
export function freezeAll(registry: readonly PoolRecord[], at: Date): PoolRecord[] {
  return registry.map((record) => {
    if (record.isFull) return record;
    assertTransition(PoolLifecycleMachine, poolState(record), 'full');
    return { ...record, isFull: true, lastUpdated: at };
  });
}

// ---------------------------------------------------------------------------
// PoolRotator
// ---------------------------------------------------------------------------

export class PoolRotator {
  private readonly baseName: string;
  private readonly admins: readonly string[];
  private readonly poolAttributes: Readonly<Record<string, string>>;
  private readonly thresholdPercent: number;
  private readonly log: LogFn;
  private readonly now: () => Date;

  constructor(
    private readonly provider: PoolProvider,
    private readonly usageStore: UsageStore,
    private readonly alerting: Alerting,
    opts: PoolRotatorOptions,
  ) {
    this.baseName = opts.baseName;
    this.admins = opts.admins;
    this.poolAttributes = opts.poolAttributes ?? {};
    this.thresholdPercent = opts.thresholdPercent ?? DEFAULT_ROTATION_THRESHOLD;
    this.log = opts.log ?? noopLog;
    this.now = opts.now ?? (() => new Date());
  }

  get threshold(): number {
    return this.thresholdPercent;
  }

  /**
   * Decide and, when the projection crosses the threshold, rotate.
   * @throws StateInvariantViolation before deciding anything
   */
  async evaluate(projection: UsageProjection, registry: readonly PoolRecord[]): Promise<RotationResult> {
    const active = findActivePool(registry);

    if (!shouldRotate(projection, this.thresholdPercent)) {
      this.log('info', {
        event: 'rotation_skipped',
        drive_name: active.driveName,
        item_percent: projection.itemPercent,
        folder_percent: projection.folderPercent,
        threshold: this.thresholdPercent,
      });
      return { status: 'skipped', previousPool: active, registryPersisted: false, registry };
    }

    return this.rotate(registry);
  }

  /**
   * Run the rotation sequence unconditionally.
   * @throws StateInvariantViolation when the registry has no single active pool
   */
  async rotate(registry: readonly PoolRecord[]): Promise<RotationResult> {
    const previousPool = findActivePool(registry);
    const name = nextPoolName(this.baseName, registry.map((record) => record.driveName));
    const startedAt = this.now();

    // Mutable state shared across steps
    const state: {
      poolId: string | null;
      adopted: boolean;
      newPool: PoolRecord | undefined;
      registry: PoolRecord[];
      persisted: boolean;
    } = { poolId: null, adopted: false, newPool: undefined, registry: [...registry], persisted: false };

    const steps: RotationStep[] = [
      {
        name: 'provisionPool',
        execute: async () => {
          let poolId = await this.provider.findPoolByName(name);
          if (poolId) {
            state.adopted = true;
            this.log('warn', { event: 'pool_adopted', drive_name: name, drive_id: poolId });
          } else {
            poolId = await this.provider.createPool(name);
            this.log('info', { event: 'pool_created', drive_name: name, drive_id: poolId });
          }
          state.poolId = poolId;
          for (const [attribute, value] of Object.entries(this.poolAttributes)) {
            await this.provider.setPoolAttribute(poolId, attribute, value);
          }
        },
      },
      {
        name: 'freezePrevious',
        execute: async () => {
          state.registry = freezeAll(state.registry, startedAt);
        },
      },
      {
        name: 'registerPool',
        execute: async () => {
          if (state.poolId === null) {
            throw new TransportError('create_pool', `No pool id was provisioned for ${name}`);
          }
          const newPool: PoolRecord = { driveId: state.poolId, driveName: name, isFull: false, lastUpdated: startedAt };
          state.newPool = newPool;
          state.registry = [...state.registry, newPool];
          findActivePool(state.registry);
        },
      },
      {
        name: 'persistRegistry',
        execute: async () => {
          await this.usageStore.writeRegistry(state.registry);
          state.persisted = true;
        },
      },
      {
        name: 'grantAccess',
        execute: async () => {
          const poolId = state.poolId;
          if (poolId === null) return;
          for (const admin of this.admins) {
            await this.provider.grantRole(poolId, admin, 'organizer');
          }
        },
      },
    ];

    for (const step of steps) {
      try {
        await step.execute();
      } catch (err) {
        const message = errorMessage(err);
        this.log('error', {
          event: 'rotation_failed',
          step: step.name,
          drive_name: name,
          registry_persisted: state.persisted,
          error: BackupError.isBackupError(err) ? err.code : 'internal_error',
          message,
        });
        await this.alerting.notify(
          `Backup pool rotation failed at ${step.name}`,
          [
            `Rotation from ${previousPool.driveName} to ${name} stopped at step ${step.name}.`,
            `Error: ${message}`,
            state.persisted
              ? `The registry already lists ${name} as the active pool; finish the remaining steps manually.`
              : `The registry still lists ${previousPool.driveName} as the active pool.`,
            state.poolId !== null && !state.persisted
              ? `Pool ${name} (${state.poolId}) exists but is unregistered; the next run adopts it.`
              : '',
          ]
            .filter((line) => line.length > 0)
            .join('\n'),
        );
        return {
          status: 'failed',
          previousPool,
          newPool: state.newPool,
          adopted: state.adopted,
          failedStep: step.name,
          error: message,
          registryPersisted: state.persisted,
          registry: state.persisted ? state.registry : registry,
        };
      }
    }

    this.log('info', {
      event: 'pool_rotated',
      from: previousPool.driveName,
      to: name,
      drive_id: state.poolId,
      adopted: state.adopted,
    });

    return {
      status: 'rotated',
      previousPool,
      newPool: state.newPool,
      adopted: state.adopted,
      registryPersisted: state.persisted,
      registry: state.registry,
    };
  }
}
