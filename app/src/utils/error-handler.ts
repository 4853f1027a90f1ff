import { BackupError } from '../errors.js';

/** Process exit codes reported to the invoking scheduler. */
export const EXIT_CODES = {
  ok: 0,
  failure: 1,
  invariantViolation: 2,
  configError: 78,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

/**
 * Map an error to the exit code the scheduler sees.
 * Unknown errors are plain failures.
 */
export function exitCodeFor(err: unknown): ExitCode {
  if (!BackupError.isBackupError(err)) return EXIT_CODES.failure;
  switch (err.code) {
    case 'state_invariant_violation':
      return EXIT_CODES.invariantViolation;
    case 'config_error':
      return EXIT_CODES.configError;
    default:
      return EXIT_CODES.failure;
  }
}

/**
 * Flatten any thrown value into log/alert fields.
 */
export function describeError(err: unknown): Record<string, unknown> {
  if (BackupError.isBackupError(err)) {
    return { error: err.code, message: err.message, ...err.details };
  }
  if (err instanceof Error) {
    return { error: 'internal_error', message: err.message };
  }
  return { error: 'internal_error', message: String(err) };
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
