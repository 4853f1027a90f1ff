/**
 * Admission Planner — Greedy, Budget-Bounded Batch Admission
 *
 * Packs suspended users into a run plan whose summed estimated copy time
 * never exceeds the cycle budget. Users who do not fit are routed to the
 * oversized queue with a classification an operator can act on:
 *
 *   manual   — the user alone exceeds the whole budget; manual track, never auto-retried
 *   deferred — the budget was used up by older users; retried next cycle
 *
 * Ordering: oldest suspension first, ties broken by email. Planning is a pure
 * function of (candidates, budget, calibration) — re-running it yields the
 * identical partition.
 *
 * Invariants:
 *   Σ runPlan.estimatedMinutes ≤ maxMinutes
 *   estimatedMinutes > maxMinutes ⇒ classification 'manual', never admitted
 */
import { ValidationError } from '../errors.js';
import type {
  AdmissionResult,
  CandidateUser,
  OversizedEntry,
  PlannedUser,
  RejectedCandidate,
} from '../types/backup.js';
import { noopLog, type LogFn } from '../utils/logger.js';
import { CostEstimator } from './cost-estimator.js';

/** Default per-cycle time budget in minutes. */
export const DEFAULT_MAX_MINUTES = 360;

export interface AdmissionPlannerOptions {
  readonly estimator?: CostEstimator;
  readonly maxMinutes?: number;
  readonly log?: LogFn;
  /** Injectable clock for queuedAt stamps. */
  readonly now?: () => Date;
}

// ---------------------------------------------------------------------------
// Validation & ordering
// ---------------------------------------------------------------------------

/**
 * Check a candidate's required fields and return it with a normalised email.
 * @throws ValidationError for a missing email, a negative / fractional /
 *   non-numeric file count, or an invalid suspension date
 */
export function validateCandidate(candidate: CandidateUser): CandidateUser {
  const email = typeof candidate.email === 'string' ? candidate.email.trim().toLowerCase() : '';
  if (!email.includes('@')) {
    throw new ValidationError(`Candidate email "${String(candidate.email)}" is invalid`, 'email');
  }

  const { fileCount } = candidate;
  if (typeof fileCount !== 'number' || !Number.isInteger(fileCount) || fileCount < 0) {
    throw new ValidationError(
      `Candidate ${email} has malformed file count "${String(fileCount)}"`,
      'fileCount',
      { email },
    );
  }

  const { suspendedSince } = candidate;
  if (!(suspendedSince instanceof Date) || Number.isNaN(suspendedSince.getTime())) {
    throw new ValidationError(`Candidate ${email} has an invalid suspension date`, 'suspendedSince', { email });
  }

  return { email, fileCount, suspendedSince };
}

/** Oldest suspension first; equal dates ordered by email. */
export function compareCandidates(a: CandidateUser, b: CandidateUser): number {
  const byDate = a.suspendedSince.getTime() - b.suspendedSince.getTime();
  if (byDate !== 0) return byDate;
  return compareEmail(a.email, b.email);
}

function compareEmail(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

// ---------------------------------------------------------------------------
// Oversized queue merge
// ---------------------------------------------------------------------------

/**
 * Merge this cycle's oversized users into the persisted queue.
 *
 * Union by email; an entry from `fresh` replaces the prior one for the same
 * email. Users admitted this cycle leave the queue. Output is sorted by email,
 * so merging the same input twice yields the same set.
 */
export function mergeOversized(
  prior: readonly OversizedEntry[],
  fresh: readonly OversizedEntry[],
  admittedEmails: Iterable<string> = [],
): OversizedEntry[] {
  const byEmail = new Map<string, OversizedEntry>();
  for (const entry of prior) byEmail.set(entry.email, entry);
  for (const entry of fresh) byEmail.set(entry.email, entry);
  for (const email of admittedEmails) byEmail.delete(email);
  return [...byEmail.values()].sort((a, b) => compareEmail(a.email, b.email));
}

/**
 * Turn queued deferred users back into candidates for the next plan.
 * Manual-track users stay out; entries without a suspension date fall back
 * to the time they were queued.
 */
export function requeueDeferred(entries: readonly OversizedEntry[]): CandidateUser[] {
  return entries
    .filter((entry) => entry.classification === 'deferred')
    .map((entry) => ({
      email: entry.email,
      fileCount: entry.fileCount,
      suspendedSince: entry.suspendedSince ?? entry.queuedAt,
    }));
}

// ---------------------------------------------------------------------------
// AdmissionPlanner
// ---------------------------------------------------------------------------

export class AdmissionPlanner {
  private readonly estimator: CostEstimator;
  private readonly maxMinutes: number;
  private readonly log: LogFn;
  private readonly now: () => Date;

  constructor(opts: AdmissionPlannerOptions = {}) {
    this.estimator = opts.estimator ?? new CostEstimator();
    this.maxMinutes = opts.maxMinutes ?? DEFAULT_MAX_MINUTES;
    this.log = opts.log ?? noopLog;
    this.now = opts.now ?? (() => new Date());
  }

  /**
   * Partition candidates into a run plan and this cycle's oversized users.
   *
   * Malformed candidates are dropped and listed in `rejected`; duplicate
   * emails keep the last occurrence. No side effects beyond logging.
   */
  plan(candidates: readonly CandidateUser[], maxMinutes: number = this.maxMinutes): AdmissionResult {
    const rejected: RejectedCandidate[] = [];
    const unique = new Map<string, CandidateUser>();

    for (const candidate of candidates) {
      try {
        const valid = validateCandidate(candidate);
        unique.set(valid.email, valid);
      } catch (err) {
        if (!(err instanceof ValidationError)) throw err;
        rejected.push({ email: String(candidate.email), field: err.field, reason: err.message });
        this.log('warn', {
          event: 'candidate_rejected',
          field: err.field,
          message: err.message,
        });
      }
    }

    const sorted = [...unique.values()].sort(compareCandidates);
    const queuedAt = this.now();
    const runPlan: PlannedUser[] = [];
    const oversized: OversizedEntry[] = [];
    let cumulative = 0;

    for (const candidate of sorted) {
      const estimate = this.estimator.estimate(candidate);

      if (estimate.estimatedMinutes > maxMinutes) {
        oversized.push({
          ...estimate,
          classification: 'manual',
          suspendedSince: candidate.suspendedSince,
          queuedAt,
        });
      } else if (cumulative + estimate.estimatedMinutes <= maxMinutes) {
        runPlan.push({ ...estimate, suspendedSince: candidate.suspendedSince });
        cumulative += estimate.estimatedMinutes;
      } else {
        oversized.push({
          ...estimate,
          classification: 'deferred',
          suspendedSince: candidate.suspendedSince,
          queuedAt,
        });
      }
    }

    this.log('info', {
      event: 'admission_planned',
      candidates: candidates.length,
      admitted: runPlan.length,
      deferred: oversized.filter((e) => e.classification === 'deferred').length,
      manual: oversized.filter((e) => e.classification === 'manual').length,
      rejected: rejected.length,
      cumulative_minutes: cumulative,
      max_minutes: maxMinutes,
    });

    return { runPlan, oversized, rejected, cumulativeMinutes: cumulative };
  }
}
