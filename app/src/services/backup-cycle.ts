/**
 * Backup Cycle — one scheduled pass of the suspended-user backup engine.
 *
 *   loading    read registry (every row readable, one active pool), candidates,
 *              oversized queue
 *   planning   admit candidates and re-offered deferred users within the budget
 *   projecting measure the active pool plus the pending cohort
 *   persisting write the merged oversized queue (unreadable rows kept) and the
 *              eligible sheet
 *   rotating   rotate the active pool when the projection crosses the threshold
 *   copying    hand each admitted user to the copier, one at a time
 *
 * Nothing is written before projecting succeeds: an unknown projection ends
 * the cycle with stored state untouched. A dry run stops after projecting.
 * Every failure is alerted (a failed rotation alerts from the rotator) and
 * reported; run() itself does not reject.
 *
 * Cycles must not overlap. The registry and queues are read-modify-write
 * without a lock.
 */
import type { Span } from '@opentelemetry/api';

import { StateInvariantViolation, TransportError } from '../errors.js';
import type {
  AdmissionResult,
  CandidateUser,
  OversizedEntry,
  PlannedUser,
  PoolRecord,
} from '../types/backup.js';
import type { Alerting, DriveCopier } from '../types/collaborators.js';
import { errorMessage } from '../utils/error-handler.js';
import { noopLog, type LogFn } from '../utils/logger.js';
import { addSanitizedAttributes, startSanitizedSpan } from '../utils/span-sanitizer.js';
import { mergeOversized, requeueDeferred, type AdmissionPlanner } from './admission-planner.js';
import { findActivePool, shouldRotate, type PoolRotator, type RotationResult } from './pool-rotator.js';
import { CyclePhaseMachine, assertTransition, type CyclePhase } from './state-machine.js';
import { isUnknownProjection, type ProjectionResult, type UsageProjector } from './usage-projector.js';
import type { SheetRead, UsageStore } from './usage-store.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface CopyOutcome {
  readonly email: string;
  readonly status: 'copied' | 'failed';
  readonly error?: string;
}

export interface CycleReport {
  readonly status: 'completed' | 'failed';
  /** Phase the cycle ended in (`completed`), or the phase that failed. */
  readonly phase: CyclePhase;
  readonly dryRun: boolean;
  readonly activePool: PoolRecord | null;
  readonly admission: AdmissionResult | null;
  readonly projection: ProjectionResult | null;
  readonly rotation: RotationResult | null;
  /** The persisted oversized queue after this cycle's merge. */
  readonly oversizedQueue: readonly OversizedEntry[];
  readonly copies: readonly CopyOutcome[];
  /** Stored rows skipped as malformed while loading. */
  readonly rejectedRows: number;
  readonly error?: unknown;
  readonly message?: string;
}

export interface BackupCycleDeps {
  readonly store: UsageStore;
  readonly planner: AdmissionPlanner;
  readonly projector: UsageProjector;
  readonly rotator: PoolRotator;
  readonly alerting: Alerting;
  /** Null hands the run plan off through the eligible sheet only. */
  readonly copier: DriveCopier | null;
}

export interface BackupCycleOptions {
  readonly dryRun?: boolean;
  /** Recorded on the cycle span as a hash. */
  readonly adminUser?: string;
  readonly log?: LogFn;
  readonly now?: () => Date;
}

/**
 * Every registry row must parse: a rewrite would drop the unreadable ones,
 * and pool naming cannot see them.
 */
function assertRegistryReadable(read: SheetRead<PoolRecord>): void {
  if (read.rejected.length === 0) return;
  throw new StateInvariantViolation(
    `Pool registry has ${read.rejected.length} unreadable row(s): ${read.rejected.map((e) => e.message).join('; ')}`,
    read.records.filter((record) => !record.isFull).length,
    { unreadable: read.unreadable.map((row) => row.DriveName ?? '') },
  );
}

/** Tracks the current phase through the cycle state machine. */
class PhaseTracker {
  private phase: CyclePhase = CyclePhaseMachine.initial;

  get current(): CyclePhase {
    return this.phase;
  }

  advance(to: CyclePhase): void {
    assertTransition(CyclePhaseMachine, this.phase, to);
    this.phase = to;
  }
}

// ---------------------------------------------------------------------------
// BackupCycle
// ---------------------------------------------------------------------------

export class BackupCycle {
  private readonly dryRun: boolean;
  private readonly adminUser: string | undefined;
  private readonly log: LogFn;
  private readonly now: () => Date;

  constructor(
    private readonly deps: BackupCycleDeps,
    opts: BackupCycleOptions = {},
  ) {
    this.dryRun = opts.dryRun ?? false;
    this.adminUser = opts.adminUser;
    this.log = opts.log ?? noopLog;
    this.now = opts.now ?? (() => new Date());
  }

  async run(): Promise<CycleReport> {
    const start = Date.now();
    return startSanitizedSpan('backup.cycle', { dry_run: this.dryRun, admin: this.adminUser }, async (span) => {
      const report = await this.execute();
      addSanitizedAttributes(span, 'backup.cycle', { status: report.status, duration_ms: Date.now() - start });
      return report;
    });
  }

  private async execute(): Promise<CycleReport> {
    const { store, projector, rotator, alerting } = this.deps;
    const tracker = new PhaseTracker();
    let report: CycleReport = {
      status: 'failed',
      phase: tracker.current,
      dryRun: this.dryRun,
      activePool: null,
      admission: null,
      projection: null,
      rotation: null,
      oversizedQueue: [],
      copies: [],
      rejectedRows: 0,
    };

    try {
      // --- loading ---------------------------------------------------------
      const registryRead = await store.readRegistry();
      assertRegistryReadable(registryRead);
      const activePool = findActivePool(registryRead.records);
      const candidatesRead = await store.readCandidates();
      const oversizedRead = await store.readOversized();
      report = {
        ...report,
        activePool,
        oversizedQueue: oversizedRead.records,
        rejectedRows: registryRead.rejected.length + candidatesRead.rejected.length + oversizedRead.rejected.length,
      };
      this.log('info', {
        event: 'cycle_loaded',
        active_pool: activePool.driveName,
        pools: registryRead.records.length,
        candidates: candidatesRead.records.length,
        queued: oversizedRead.records.length,
        rejected_rows: report.rejectedRows,
        dry_run: this.dryRun,
      });

      // --- planning --------------------------------------------------------
      tracker.advance('planning');
      // Candidates come last so they win over a re-offered entry for the same user.
      const offered = [...requeueDeferred(oversizedRead.records), ...candidatesRead.records];
      const admission = await startSanitizedSpan('backup.admission', {}, async (span) => this.plan(offered, span));
      report = { ...report, admission };

      // --- projecting ------------------------------------------------------
      tracker.advance('projecting');
      const deferred = admission.oversized.filter((entry) => entry.classification === 'deferred');
      const pending: readonly { readonly email: string }[] = [...admission.runPlan, ...deferred];
      const projection = await startSanitizedSpan('backup.projection', {}, async (span) => {
        const result = await projector.project(activePool, pending);
        addSanitizedAttributes(span, 'backup.projection', {
          pending_users: result.pendingUsers,
          item_percent: result.projection.itemPercent,
          folder_percent: result.projection.folderPercent,
          failed_probes: result.failedProbes.length,
          unknown: isUnknownProjection(result.projection),
        });
        return result;
      });
      report = { ...report, projection };

      if (isUnknownProjection(projection.projection)) {
        throw new TransportError(
          'list_pool',
          `Active pool ${activePool.driveName} could not be measured: ${projection.poolError ?? 'unknown error'}`,
        );
      }

      if (this.dryRun) {
        tracker.advance('completed');
        this.log('info', {
          event: 'cycle_dry_run',
          admitted: admission.runPlan.length,
          item_percent: projection.projection.itemPercent,
          folder_percent: projection.projection.folderPercent,
          would_rotate: shouldRotate(projection.projection, rotator.threshold),
        });
        return { ...report, status: 'completed', phase: tracker.current };
      }

      // --- persisting ------------------------------------------------------
      tracker.advance('persisting');
      const plannedAt = this.now();
      const queue = mergeOversized(
        oversizedRead.records,
        admission.oversized,
        admission.runPlan.map((user) => user.email),
      );
      await store.writeOversized(queue, oversizedRead.unreadable);
      await store.writeEligible(
        admission.runPlan,
        queue.filter((entry) => entry.classification === 'deferred'),
        plannedAt,
      );
      report = { ...report, oversizedQueue: queue };

      // --- rotating --------------------------------------------------------
      tracker.advance('rotating');
      const rotation = await startSanitizedSpan('backup.rotation', {}, async (span) => {
        const result = await rotator.evaluate(projection.projection, registryRead.records);
        addSanitizedAttributes(span, 'backup.rotation', {
          status: result.status,
          from_pool: result.previousPool.driveName,
          to_pool: result.newPool?.driveName,
          failed_step: result.failedStep,
          adopted: result.adopted,
        });
        return result;
      });
      report = { ...report, rotation };

      if (rotation.status === 'failed') {
        // The rotator has already alerted with the failed step.
        tracker.advance('failed');
        const message = `Pool rotation failed at ${rotation.failedStep ?? 'unknown step'}: ${rotation.error ?? 'unknown error'}`;
        this.log('error', { event: 'cycle_failed', phase: 'rotating', message });
        return {
          ...report,
          status: 'failed',
          phase: 'rotating',
          error: new TransportError('rotate_pool', message),
          message,
        };
      }

      const targetPool = rotation.newPool ?? activePool;

      // --- copying ---------------------------------------------------------
      if (this.deps.copier === null) {
        tracker.advance('completed');
        this.log('info', {
          event: 'copy_handoff',
          admitted: admission.runPlan.length,
          drive_name: targetPool.driveName,
        });
        return { ...report, status: 'completed', phase: tracker.current };
      }

      tracker.advance('copying');
      const copies = await this.copyAll(this.deps.copier, admission.runPlan, targetPool);
      report = { ...report, copies };

      const failed = copies.filter((outcome) => outcome.status === 'failed');
      if (failed.length > 0) {
        await alerting.notify(
          `Backup copy failed for ${failed.length} of ${copies.length} users`,
          failed.map((outcome) => `${outcome.email}: ${outcome.error ?? 'unknown error'}`).join('\n'),
        );
      }

      tracker.advance('completed');
      this.log('info', {
        event: 'cycle_completed',
        drive_name: targetPool.driveName,
        rotated: rotation.status === 'rotated',
        copied: copies.length - failed.length,
        copy_failures: failed.length,
      });
      return { ...report, status: 'completed', phase: tracker.current };
    } catch (err) {
      const failedPhase = tracker.current;
      const message = errorMessage(err);
      this.log('error', { event: 'cycle_failed', phase: failedPhase, message });
      await alerting.notify(`Backup cycle failed during ${failedPhase}`, message);
      return { ...report, status: 'failed', phase: failedPhase, error: err, message };
    }
  }

  private plan(offered: readonly CandidateUser[], span: Span): AdmissionResult {
    const admission = this.deps.planner.plan(offered);
    addSanitizedAttributes(span, 'backup.admission', {
      candidates: offered.length,
      admitted: admission.runPlan.length,
      deferred: admission.oversized.filter((entry) => entry.classification === 'deferred').length,
      manual: admission.oversized.filter((entry) => entry.classification === 'manual').length,
      rejected: admission.rejected.length,
      cumulative_minutes: admission.cumulativeMinutes,
    });
    return admission;
  }

  private async copyAll(
    copier: DriveCopier,
    runPlan: readonly PlannedUser[],
    pool: PoolRecord,
  ): Promise<CopyOutcome[]> {
    const outcomes: CopyOutcome[] = [];
    for (const user of runPlan) {
      try {
        await copier.copyUser(user, pool);
        outcomes.push({ email: user.email, status: 'copied' });
      } catch (err) {
        const message = errorMessage(err);
        this.log('warn', { event: 'copy_failed', email: user.email, drive_name: pool.driveName, message });
        outcomes.push({ email: user.email, status: 'failed', error: message });
      }
    }
    return outcomes;
  }
}
