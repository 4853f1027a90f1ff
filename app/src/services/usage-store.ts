/**
 * Usage Store — Typed repository over the tabular registry.
 *
 * Owns four sheets in one tabular resource:
 *   registry   — pool records (sole writer)
 *   candidates — suspended users produced by the inventory job (read only)
 *   oversized  — persisted queue of users not yet processed
 *   eligible   — the current cycle's batch, handed to the copy collaborator
 *
 * Every read validates rows against the sheet's schema; a failing row is a
 * ValidationError that is logged and skipped. Every write replaces the whole
 * sheet with a stable header. Transport failures surface as TransportError.
 *
 * Concurrency: read-modify-write with no locking. Correct only while a single
 * cycle runs at a time.
 */
import type { SheetNames } from '../config.js';
import { TransportError, ValidationError } from '../errors.js';
import type {
  CandidateUser,
  OversizedEntry,
  PlannedUser,
  PoolRecord,
} from '../types/backup.js';
import type { TabularRow, TabularStore } from '../types/collaborators.js';
import {
  CandidateRowSchema,
  ELIGIBLE_HEADER,
  EligibleRowSchema,
  OVERSIZED_HEADER,
  OversizedRowSchema,
  REGISTRY_HEADER,
  RegistryRowSchema,
  formatBoolean,
  formatTimestamp,
  parseRow,
} from '../types/tabular.js';
import { errorMessage } from '../utils/error-handler.js';
import { noopLog, type LogFn } from '../utils/logger.js';

/** Records that parsed, plus the rows that did not. */
export interface SheetRead<T> {
  readonly records: T[];
  readonly rejected: ValidationError[];
  /** The rejected rows as stored, in sheet order. */
  readonly unreadable: TabularRow[];
}

/** The eligible sheet read back: admitted users and deferred ones. */
export interface EligibleBatch {
  readonly admitted: PlannedUser[];
  readonly deferred: OversizedEntry[];
  readonly rejected: ValidationError[];
}

export interface UsageStoreOptions {
  readonly resourceId: string;
  readonly sheets: SheetNames;
  readonly log?: LogFn;
}

/** Stamp used for rows written without a timestamp of their own. */
const EPOCH = new Date(0);

// ---------------------------------------------------------------------------
// Row mapping
// ---------------------------------------------------------------------------

export function registryToRows(records: readonly PoolRecord[]): TabularRow[] {
  return records.map((record) => ({
    DriveName: record.driveName,
    DriveID: record.driveId,
    IsFull: formatBoolean(record.isFull),
    LastUpdated: formatTimestamp(record.lastUpdated),
  }));
}

export function oversizedToRow(entry: OversizedEntry): TabularRow {
  return {
    UserEmail: entry.email,
    FileCount: String(entry.fileCount),
    EstimatedCopyTimeMin: String(entry.estimatedMinutes),
    RotationTime: formatTimestamp(entry.queuedAt),
    SuspendedSince: entry.suspendedSince ? formatTimestamp(entry.suspendedSince) : '',
    Classification: entry.classification === 'manual' ? 'Manual' : 'Deferred',
  };
}

/**
 * Eligible sheet rows: the run plan (Deferred=FALSE) followed by this
 * cycle's deferred users (Deferred=TRUE). Manual-track users are not listed.
 */
export function eligibleToRows(
  runPlan: readonly PlannedUser[],
  deferred: readonly OversizedEntry[],
  plannedAt: Date,
): TabularRow[] {
  const admitted = runPlan.map((user) => ({
    UserEmail: user.email,
    FileCount: String(user.fileCount),
    EstimatedCopyTimeMin: String(user.estimatedMinutes),
    RotationTime: formatTimestamp(plannedAt),
    SuspendedSince: formatTimestamp(user.suspendedSince),
    Classification: '',
    Deferred: formatBoolean(false),
  }));
  const waiting = deferred
    .filter((entry) => entry.classification === 'deferred')
    .map((entry) => ({ ...oversizedToRow(entry), Deferred: formatBoolean(true) }));
  return [...admitted, ...waiting];
}

// ---------------------------------------------------------------------------
// UsageStore
// ---------------------------------------------------------------------------

export class UsageStore {
  private readonly resourceId: string;
  private readonly sheets: SheetNames;
  private readonly log: LogFn;

  constructor(
    private readonly store: TabularStore,
    opts: UsageStoreOptions,
  ) {
    this.resourceId = opts.resourceId;
    this.sheets = opts.sheets;
    this.log = opts.log ?? noopLog;
  }

  // -----------------------------------------------------------------------
  // Registry
  // -----------------------------------------------------------------------

  async readRegistry(): Promise<SheetRead<PoolRecord>> {
    return this.read<PoolRecord>(this.sheets.registry, (row, index) => {
      const parsed = parseRow(RegistryRowSchema, row, { sheet: this.sheets.registry, index });
      return {
        driveId: parsed.DriveID,
        driveName: parsed.DriveName,
        isFull: parsed.IsFull,
        lastUpdated: parsed.LastUpdated ?? EPOCH,
      };
    });
  }

  async writeRegistry(records: readonly PoolRecord[]): Promise<void> {
    await this.write(this.sheets.registry, REGISTRY_HEADER, registryToRows(records));
  }

  // -----------------------------------------------------------------------
  // Candidates
  // -----------------------------------------------------------------------

  async readCandidates(): Promise<SheetRead<CandidateUser>> {
    return this.read<CandidateUser>(this.sheets.candidates, (row, index) => {
      const parsed = parseRow(CandidateRowSchema, row, { sheet: this.sheets.candidates, index });
      return {
        email: parsed.UserEmail,
        fileCount: parsed.FileCount,
        suspendedSince: parsed.SuspendedSince,
      };
    });
  }

  // -----------------------------------------------------------------------
  // Oversized queue
  // -----------------------------------------------------------------------

  async readOversized(): Promise<SheetRead<OversizedEntry>> {
    return this.read<OversizedEntry>(this.sheets.oversized, (row, index) => {
      const parsed = parseRow(OversizedRowSchema, row, { sheet: this.sheets.oversized, index });
      return {
        email: parsed.UserEmail,
        fileCount: parsed.FileCount,
        estimatedMinutes: parsed.EstimatedCopyTimeMin,
        classification: parsed.Classification ?? 'deferred',
        suspendedSince: parsed.SuspendedSince,
        queuedAt: parsed.RotationTime ?? EPOCH,
      };
    });
  }

  /**
   * Replace the queue. `unreadable` rows from the last read are written back
   * verbatim after the entries so an operator can repair them.
   */
  async writeOversized(entries: readonly OversizedEntry[], unreadable: readonly TabularRow[] = []): Promise<void> {
    if (unreadable.length > 0) {
      this.log('warn', { event: 'rows_preserved', sheet: this.sheets.oversized, rows: unreadable.length });
    }
    await this.write(this.sheets.oversized, OVERSIZED_HEADER, [...entries.map(oversizedToRow), ...unreadable]);
  }

  // -----------------------------------------------------------------------
  // Eligible batch
  // -----------------------------------------------------------------------

  async readEligible(): Promise<EligibleBatch> {
    const read = await this.read(this.sheets.eligible, (row, index) =>
      parseRow(EligibleRowSchema, row, { sheet: this.sheets.eligible, index }),
    );

    const admitted: PlannedUser[] = [];
    const deferred: OversizedEntry[] = [];
    for (const row of read.records) {
      const queuedAt = row.RotationTime ?? EPOCH;
      if (row.Deferred) {
        deferred.push({
          email: row.UserEmail,
          fileCount: row.FileCount,
          estimatedMinutes: row.EstimatedCopyTimeMin,
          classification: 'deferred',
          suspendedSince: row.SuspendedSince,
          queuedAt,
        });
      } else {
        admitted.push({
          email: row.UserEmail,
          fileCount: row.FileCount,
          estimatedMinutes: row.EstimatedCopyTimeMin,
          suspendedSince: row.SuspendedSince ?? queuedAt,
        });
      }
    }
    return { admitted, deferred, rejected: read.rejected };
  }

  async writeEligible(
    runPlan: readonly PlannedUser[],
    deferred: readonly OversizedEntry[],
    plannedAt: Date,
  ): Promise<void> {
    await this.write(this.sheets.eligible, ELIGIBLE_HEADER, eligibleToRows(runPlan, deferred, plannedAt));
  }

  // -----------------------------------------------------------------------
  // Internals
  // -----------------------------------------------------------------------

  private async read<T>(
    sheet: string,
    map: (row: TabularRow, index: number) => T,
  ): Promise<SheetRead<T>> {
    let rows: TabularRow[];
    try {
      rows = await this.store.download(this.resourceId, sheet);
    } catch (err) {
      throw asTransportError('download_sheet', sheet, err);
    }

    const records: T[] = [];
    const rejected: ValidationError[] = [];
    const unreadable: TabularRow[] = [];
    for (const [index, row] of rows.entries()) {
      try {
        records.push(map(row, index));
      } catch (err) {
        if (!(err instanceof ValidationError)) throw err;
        rejected.push(err);
        unreadable.push(row);
        this.log('warn', { event: 'row_rejected', sheet, field: err.field, message: err.message });
      }
    }

    this.log('debug', { event: 'sheet_read', sheet, rows: rows.length, rejected: rejected.length });
    return { records, rejected, unreadable };
  }

  private async write(sheet: string, header: readonly string[], rows: TabularRow[]): Promise<void> {
    try {
      await this.store.upload(this.resourceId, sheet, header, rows);
    } catch (err) {
      throw asTransportError('upload_sheet', sheet, err);
    }
    this.log('info', { event: 'sheet_written', sheet, rows: rows.length });
  }
}

function asTransportError(operation: string, sheet: string, err: unknown): TransportError {
  if (err instanceof TransportError) return err;
  return new TransportError(operation, `${operation} ${sheet} failed: ${errorMessage(err)}`, {
    cause: err,
    details: { sheet },
  });
}
