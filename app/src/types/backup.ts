/**
 * Backup engine domain types.
 *
 * Everything here is immutable per cycle: candidates are read once, plans and
 * projections are recomputed every run, pool records are only ever replaced
 * wholesale by the registry writer.
 */

/** A suspended user whose drive is waiting to be backed up. */
export interface CandidateUser {
  /** Lower-cased primary email; unique key. */
  readonly email: string;
  readonly fileCount: number;
  readonly suspendedSince: Date;
}

/** Estimated copy duration for one user. */
export interface CostEstimate {
  readonly email: string;
  readonly fileCount: number;
  readonly estimatedMinutes: number;
}

/** An admitted user in the run plan. */
export interface PlannedUser extends CostEstimate {
  readonly suspendedSince: Date;
}

/**
 * Why a user did not make the run plan.
 * - deferred: lost to contention this cycle; retried automatically next cycle
 * - manual:   alone exceeds the whole budget; never auto-retried
 */
export type OversizedClassification = 'deferred' | 'manual';

export interface OversizedEntry extends CostEstimate {
  readonly classification: OversizedClassification;
  /** Absent for rows written before the column existed. */
  readonly suspendedSince?: Date;
  /** When the entry was (last) queued. */
  readonly queuedAt: Date;
}

/** A candidate dropped during planning because it failed validation. */
export interface RejectedCandidate {
  readonly email: string;
  readonly field: string;
  readonly reason: string;
}

export interface AdmissionResult {
  /** Admitted users, oldest suspension first. */
  readonly runPlan: readonly PlannedUser[];
  /** Users oversized in this cycle only (not yet merged with the persisted queue). */
  readonly oversized: readonly OversizedEntry[];
  readonly rejected: readonly RejectedCandidate[];
  readonly cumulativeMinutes: number;
}

/** One shared storage pool in the registry. */
export interface PoolRecord {
  readonly driveId: string;
  readonly driveName: string;
  readonly isFull: boolean;
  readonly lastUpdated: Date;
}

/** Occupancy counts of a pool or a user's drive. */
export interface UsageCount {
  readonly items: number;
  readonly folders: number;
}

export interface UsageLimits {
  readonly itemLimit: number;
  readonly folderLimit: number;
}

/** Sentinel percent for "active pool could not be measured". */
export const UNKNOWN_PERCENT = -1;

export interface UsageProjection {
  readonly currentItems: number;
  readonly currentFolders: number;
  readonly projectedItems: number;
  readonly projectedFolders: number;
  /** 0–100+ with two decimals, or UNKNOWN_PERCENT. */
  readonly itemPercent: number;
  readonly folderPercent: number;
}
