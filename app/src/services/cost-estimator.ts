import type { CandidateUser, CostEstimate } from '../types/backup.js';

/** Default copy cost calibration (seconds per file). */
export const DEFAULT_SECONDS_PER_FILE = 1.2;

/**
 * Decimal places a minute value is normalised to before ceiling, so that
 * binary noise (3 × 1.2 = 3.5999999999999996) cannot push an exact
 * minute boundary up by one.
 */
export const ESTIMATE_PRECISION = 6;

/**
 * Minutes to copy `fileCount` files: ⌈fileCount × secondsPerFile / 60⌉.
 * Total for fileCount ≥ 0; never negative.
 */
export function estimateMinutes(fileCount: number, secondsPerFile = DEFAULT_SECONDS_PER_FILE): number {
  const scale = 10 ** ESTIMATE_PRECISION;
  const minutes = Math.round(((fileCount * secondsPerFile) / 60) * scale) / scale;
  return Math.max(0, Math.ceil(minutes));
}

/**
 * Cost Estimator — converts a user's file count into a copy duration.
 * The calibration constant is injected, never hard-coded at call sites.
 */
export class CostEstimator {
  constructor(readonly secondsPerFile: number = DEFAULT_SECONDS_PER_FILE) {}

  estimate(user: Pick<CandidateUser, 'email' | 'fileCount'>, secondsPerFile = this.secondsPerFile): CostEstimate {
    return {
      email: user.email,
      fileCount: user.fileCount,
      estimatedMinutes: estimateMinutes(user.fileCount, secondsPerFile),
    };
  }
}
