/**
 * Backup Cycle Tests — end-to-end passes over in-process collaborators.
 *
 * Covers: the happy path, rotation, the pending cohort, abort-before-mutation
 * on an unknown projection, invariant violations, dry runs, rotation and copy
 * failures, deferred re-offers, and the unlocked read-modify-write gap when
 * two cycles overlap.
 */
import { describe, it, expect } from 'vitest';
import { BackupCycle } from '../backup-cycle.js';
import { AdmissionPlanner } from '../admission-planner.js';
import { PoolRotator } from '../pool-rotator.js';
import { UsageProjector } from '../usage-projector.js';
import { UsageStore } from '../usage-store.js';
import { StateInvariantViolation } from '../../errors.js';
import { EXIT_CODES, exitCodeFor } from '../../utils/error-handler.js';
import type { InventoryEntry, InventoryTarget, TabularRow } from '../../types/collaborators.js';
import {
  BASE_NAME,
  FakeInventory,
  FakePoolProvider,
  FlakyTabularStore,
  RESOURCE_ID,
  RecordingAlerting,
  RecordingCopier,
  SHEETS,
  registryRow,
} from '../../../tests/fixtures/backup-fakes.js';

const NOW = new Date('2024-06-01T12:00:00.000Z');
const LIMITS = { itemLimit: 1000, folderLimit: 100 };

function candidateRow(email: string, fileCount: number, suspendedSince: string): TabularRow {
  return { UserEmail: email, FileCount: String(fileCount), SuspendedSince: suspendedSince };
}

interface HarnessOptions {
  maxMinutes?: number;
  dryRun?: boolean;
  withCopier?: boolean;
  inventory?: FakeInventory;
}

function createHarness(opts: HarnessOptions = {}) {
  const tabular = new FlakyTabularStore();
  const store = new UsageStore(tabular, { resourceId: RESOURCE_ID, sheets: SHEETS });
  const inventory = opts.inventory ?? new FakeInventory();
  const provider = new FakePoolProvider();
  const alerting = new RecordingAlerting();
  const copier = new RecordingCopier();

  const build = (inv: FakeInventory) =>
    new BackupCycle(
      {
        store,
        planner: new AdmissionPlanner({ maxMinutes: opts.maxMinutes ?? 3, now: () => NOW }),
        projector: new UsageProjector(inv, { limits: LIMITS }),
        rotator: new PoolRotator(provider, store, alerting, {
          baseName: BASE_NAME,
          admins: ['admin@example.com'],
          now: () => NOW,
        }),
        alerting,
        copier: opts.withCopier === false ? null : copier,
      },
      { dryRun: opts.dryRun, now: () => NOW },
    );

  tabular.seed(RESOURCE_ID, SHEETS.registry, [registryRow(BASE_NAME, 'drive-1', false)]);

  return { tabular, store, inventory, provider, alerting, copier, cycle: build(inventory), build };
}

describe('BackupCycle', () => {
  it('plans, projects, persists and copies without rotating below the threshold', async () => {
    const h = createHarness();
    h.tabular.seed(RESOURCE_ID, SHEETS.candidates, [
      candidateRow('a@example.com', 100, '2024-01-01T00:00:00.000Z'),
      candidateRow('b@example.com', 50, '2024-02-01T00:00:00.000Z'),
    ]);
    h.inventory.setPool('drive-1', 100, 10).setUser('a@example.com', 10, 1).setUser('b@example.com', 5);

    const report = await h.cycle.run();

    expect(report.status).toBe('completed');
    expect(report.phase).toBe('completed');
    expect(report.admission?.cumulativeMinutes).toBe(3);
    expect(report.projection?.projection.itemPercent).toBe(11.5);
    expect(report.rotation?.status).toBe('skipped');
    expect(report.copies).toEqual([
      { email: 'a@example.com', status: 'copied' },
      { email: 'b@example.com', status: 'copied' },
    ]);
    expect(h.copier.copied).toEqual([
      { email: 'a@example.com', driveId: 'drive-1' },
      { email: 'b@example.com', driveId: 'drive-1' },
    ]);

    const eligible = await h.store.readEligible();
    expect(eligible.admitted.map((u) => u.email)).toEqual(['a@example.com', 'b@example.com']);
    expect((await h.store.readOversized()).records).toEqual([]);
    expect(h.alerting.alerts).toEqual([]);
  });

  it('rotates at 80% and copies into the new pool', async () => {
    const h = createHarness();
    h.tabular.seed(RESOURCE_ID, SHEETS.candidates, [candidateRow('a@example.com', 100, '2024-01-01T00:00:00.000Z')]);
    h.inventory.setPool('drive-1', 790).setUser('a@example.com', 10);

    const report = await h.cycle.run();

    expect(report.status).toBe('completed');
    expect(report.projection?.projection.itemPercent).toBe(80);
    expect(report.rotation?.status).toBe('rotated');
    expect(report.rotation?.newPool?.driveName).toBe('Legacydrivebackup2');
    expect(h.copier.copied).toEqual([{ email: 'a@example.com', driveId: 'drive-new-1' }]);

    const registry = await h.store.readRegistry();
    expect(registry.records.map((r) => [r.driveName, r.isFull])).toEqual([
      ['Legacydrivebackup', true],
      ['Legacydrivebackup2', false],
    ]);
  });

  it('projects the run plan and deferred users but not the manual track', async () => {
    const h = createHarness({ maxMinutes: 2 });
    h.tabular.seed(RESOURCE_ID, SHEETS.candidates, [
      candidateRow('a@example.com', 100, '2024-01-01T00:00:00.000Z'), // 2 min, admitted
      candidateRow('d@example.com', 100, '2024-01-02T00:00:00.000Z'), // 2 min, deferred
      candidateRow('m@example.com', 1000, '2024-01-03T00:00:00.000Z'), // 20 min, manual
    ]);
    h.inventory.setPool('drive-1', 0).setUser('a@example.com', 10).setUser('d@example.com', 20).setUser('m@example.com', 500);

    const report = await h.cycle.run();

    expect(h.inventory.calls).toEqual([
      { kind: 'pool', driveId: 'drive-1' },
      { kind: 'user', email: 'a@example.com' },
      { kind: 'user', email: 'd@example.com' },
    ]);
    expect(report.projection?.projection.projectedItems).toBe(30);

    const queue = await h.store.readOversized();
    expect(queue.records.map((e) => [e.email, e.classification])).toEqual([
      ['d@example.com', 'deferred'],
      ['m@example.com', 'manual'],
    ]);
    const eligible = await h.store.readEligible();
    expect(eligible.admitted.map((u) => u.email)).toEqual(['a@example.com']);
    expect(eligible.deferred.map((u) => u.email)).toEqual(['d@example.com']);
    expect(h.copier.copied.map((c) => c.email)).toEqual(['a@example.com']);
  });

  it('aborts without writing anything when the active pool cannot be measured', async () => {
    const h = createHarness();
    h.tabular.seed(RESOURCE_ID, SHEETS.candidates, [candidateRow('a@example.com', 100, '2024-01-01T00:00:00.000Z')]);
    h.inventory.failingPools.add('drive-1');

    const report = await h.cycle.run();

    expect(report.status).toBe('failed');
    expect(report.phase).toBe('projecting');
    expect(h.tabular.uploads.size).toBe(0);
    expect(h.provider.calls).toEqual([]);
    expect(h.copier.copied).toEqual([]);
    expect(h.alerting.alerts).toEqual([
      {
        subject: 'Backup cycle failed during projecting',
        body: 'Active pool Legacydrivebackup could not be measured: listing drive-1 failed',
        recipients: undefined,
      },
    ]);
    expect(exitCodeFor(report.error)).toBe(EXIT_CODES.failure);
  });

  it('refuses to run on a registry with several active pools', async () => {
    const h = createHarness();
    h.tabular.seed(RESOURCE_ID, SHEETS.registry, [
      registryRow(BASE_NAME, 'drive-1', false),
      registryRow('Legacydrivebackup2', 'drive-2', false),
    ]);

    const report = await h.cycle.run();

    expect(report.status).toBe('failed');
    expect(report.phase).toBe('loading');
    expect(report.error).toBeInstanceOf(StateInvariantViolation);
    expect(exitCodeFor(report.error)).toBe(EXIT_CODES.invariantViolation);
    expect(h.alerting.alerts[0].subject).toBe('Backup cycle failed during loading');
    expect(h.tabular.uploads.size).toBe(0);
  });

  it('refuses to run when a registry row cannot be read', async () => {
    const h = createHarness();
    const stored = [
      registryRow(BASE_NAME, 'drive-1', true),
      { DriveName: 'Legacydrivebackup2', DriveID: 'drive-2', IsFull: 'yes', LastUpdated: '' },
      registryRow('Legacydrivebackup3', 'drive-3', false),
    ];
    h.tabular.seed(RESOURCE_ID, SHEETS.registry, stored);
    h.tabular.seed(RESOURCE_ID, SHEETS.candidates, [candidateRow('a@example.com', 100, '2024-01-01T00:00:00.000Z')]);
    h.inventory.setPool('drive-3', 900).setUser('a@example.com', 10);

    const report = await h.cycle.run();

    expect(report.status).toBe('failed');
    expect(report.phase).toBe('loading');
    expect(report.error).toBeInstanceOf(StateInvariantViolation);
    expect(report.message).toMatch(/^Pool registry has 1 unreadable row\(s\): DriveRegistry row 2: IsFull /);
    expect(exitCodeFor(report.error)).toBe(EXIT_CODES.invariantViolation);
    expect(h.alerting.alerts[0].subject).toBe('Backup cycle failed during loading');
    expect(h.provider.calls).toEqual([]);
    expect(h.tabular.uploads.size).toBe(0);
    expect((await h.tabular.download(RESOURCE_ID, SHEETS.registry)).map((row) => row.DriveID)).toEqual([
      'drive-1',
      'drive-2',
      'drive-3',
    ]);
  });

  it('writes unreadable queue rows back unchanged', async () => {
    const h = createHarness();
    h.tabular.seed(RESOURCE_ID, SHEETS.oversized, [
      { UserEmail: 'big@example.com', FileCount: '9000', EstimatedCopyTimeMin: '180.0', Classification: 'Manual' },
    ]);
    h.tabular.seed(RESOURCE_ID, SHEETS.candidates, [candidateRow('a@example.com', 100, '2024-01-01T00:00:00.000Z')]);
    h.inventory.setPool('drive-1', 0).setUser('a@example.com', 10);

    const report = await h.cycle.run();

    expect(report.status).toBe('completed');
    expect(report.rejectedRows).toBe(1);
    expect(report.oversizedQueue).toEqual([]);
    expect(await h.tabular.download(RESOURCE_ID, SHEETS.oversized)).toEqual([
      {
        UserEmail: 'big@example.com',
        FileCount: '9000',
        EstimatedCopyTimeMin: '180.0',
        RotationTime: '',
        SuspendedSince: '',
        Classification: 'Manual',
      },
    ]);
    expect((await h.store.readOversized()).rejected).toHaveLength(1);
  });

  it('plans and projects but mutates nothing in a dry run', async () => {
    const h = createHarness({ dryRun: true });
    h.tabular.seed(RESOURCE_ID, SHEETS.candidates, [candidateRow('a@example.com', 100, '2024-01-01T00:00:00.000Z')]);
    h.inventory.setPool('drive-1', 950).setUser('a@example.com', 10);

    const report = await h.cycle.run();

    expect(report.status).toBe('completed');
    expect(report.dryRun).toBe(true);
    expect(report.projection?.projection.itemPercent).toBe(96);
    expect(report.rotation).toBeNull();
    expect(h.tabular.uploads.size).toBe(0);
    expect(h.provider.calls).toEqual([]);
    expect(h.copier.copied).toEqual([]);
  });

  it('fails the cycle and skips copying when rotation fails', async () => {
    const h = createHarness();
    h.tabular.seed(RESOURCE_ID, SHEETS.candidates, [candidateRow('a@example.com', 100, '2024-01-01T00:00:00.000Z')]);
    h.inventory.setPool('drive-1', 900).setUser('a@example.com', 10);
    h.provider.failures.createPool = new Error('quota exceeded');

    const report = await h.cycle.run();

    expect(report.status).toBe('failed');
    expect(report.phase).toBe('rotating');
    expect(report.message).toBe('Pool rotation failed at provisionPool: quota exceeded');
    expect(h.copier.copied).toEqual([]);
    // Only the rotator's own alert
    expect(h.alerting.alerts.map((a) => a.subject)).toEqual(['Backup pool rotation failed at provisionPool']);
  });

  it('reports per-user copy failures without failing the cycle', async () => {
    const h = createHarness();
    h.tabular.seed(RESOURCE_ID, SHEETS.candidates, [
      candidateRow('a@example.com', 100, '2024-01-01T00:00:00.000Z'),
      candidateRow('b@example.com', 50, '2024-02-01T00:00:00.000Z'),
    ]);
    h.inventory.setPool('drive-1', 0);
    h.copier.failing.add('a@example.com');

    const report = await h.cycle.run();

    expect(report.status).toBe('completed');
    expect(report.copies).toEqual([
      { email: 'a@example.com', status: 'failed', error: 'copy of a@example.com failed' },
      { email: 'b@example.com', status: 'copied' },
    ]);
    expect(h.alerting.alerts).toEqual([
      {
        subject: 'Backup copy failed for 1 of 2 users',
        body: 'a@example.com: copy of a@example.com failed',
        recipients: undefined,
      },
    ]);
  });

  it('hands the plan off through the eligible sheet when no copier is configured', async () => {
    const h = createHarness({ withCopier: false });
    h.tabular.seed(RESOURCE_ID, SHEETS.candidates, [candidateRow('a@example.com', 100, '2024-01-01T00:00:00.000Z')]);
    h.inventory.setPool('drive-1', 0);

    const report = await h.cycle.run();

    expect(report.status).toBe('completed');
    expect(report.copies).toEqual([]);
    expect((await h.store.readEligible()).admitted.map((u) => u.email)).toEqual(['a@example.com']);
  });

  it('re-offers deferred users from the queue and drops them once admitted', async () => {
    const h = createHarness();
    h.tabular.seed(RESOURCE_ID, SHEETS.oversized, [
      {
        UserEmail: 'd@example.com',
        FileCount: '100',
        EstimatedCopyTimeMin: '2',
        RotationTime: '2024-05-01T00:00:00.000Z',
        SuspendedSince: '2024-01-01T00:00:00.000Z',
        Classification: 'Deferred',
      },
      {
        UserEmail: 'm@example.com',
        FileCount: '90000',
        EstimatedCopyTimeMin: '1800',
        RotationTime: '2024-05-01T00:00:00.000Z',
        SuspendedSince: '2024-01-01T00:00:00.000Z',
        Classification: 'Manual',
      },
    ]);
    h.inventory.setPool('drive-1', 0);

    const report = await h.cycle.run();

    expect(report.admission?.runPlan.map((u) => u.email)).toEqual(['d@example.com']);
    expect(h.copier.copied.map((c) => c.email)).toEqual(['d@example.com']);
    const queue = await h.store.readOversized();
    expect(queue.records.map((e) => [e.email, e.classification, e.queuedAt.toISOString()])).toEqual([
      ['m@example.com', 'manual', '2024-05-01T00:00:00.000Z'],
    ]);
  });

  it('lets two overlapping cycles both rotate (no lock on the registry)', async () => {
    let reached: () => void = () => {};
    const atGate = new Promise<void>((resolve) => {
      reached = resolve;
    });
    let release: () => void = () => {};
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });

    class GatedInventory extends FakeInventory {
      override async *listFiles(target: InventoryTarget): AsyncGenerator<InventoryEntry> {
        if (target.kind === 'pool') {
          reached();
          await gate;
        }
        yield* super.listFiles(target);
      }
    }

    const h = createHarness();
    h.tabular.seed(RESOURCE_ID, SHEETS.candidates, [candidateRow('a@example.com', 100, '2024-01-01T00:00:00.000Z')]);
    h.inventory.setPool('drive-1', 790).setUser('a@example.com', 10);
    const slow = h.build(new GatedInventory().setPool('drive-1', 790).setUser('a@example.com', 10));

    // The slow cycle has loaded the registry and is waiting on the pool listing
    const slowRun = slow.run();
    await atGate;

    const first = await h.cycle.run();
    release();
    const second = await slowRun;

    expect(first.rotation?.status).toBe('rotated');
    expect(second.rotation?.status).toBe('rotated');
    expect(second.rotation?.adopted).toBe(true);
    expect(h.provider.calls.filter((c) => c.startsWith('createPool'))).toHaveLength(1);
    // Both cycles copied the same user
    expect(h.copier.copied).toEqual([
      { email: 'a@example.com', driveId: 'drive-new-1' },
      { email: 'a@example.com', driveId: 'drive-new-1' },
    ]);
  });
});
