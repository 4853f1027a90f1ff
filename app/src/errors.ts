/**
 * BackupError — Structured error hierarchy for the backup engine.
 *
 * Extends native Error so `.stack` survives into logs, while carrying a
 * stable `code` and structured `details` for alert bodies and exit codes.
 *
 * Taxonomy:
 * - ValidationError          — malformed input row; the row is skipped, the batch continues
 * - TransportError           — an external call failed (non-zero exit, unreachable)
 * - StateInvariantViolation  — the pool registry does not have exactly one active pool
 */

export type BackupErrorCode =
  | 'validation_error'
  | 'transport_error'
  | 'state_invariant_violation'
  | 'invalid_transition'
  | 'config_error';

export class BackupError extends Error {
  readonly code: BackupErrorCode;

  /** Diagnostic fields safe to include in logs and alert bodies. */
  readonly details: Record<string, unknown>;

  constructor(code: BackupErrorCode, message: string, details: Record<string, unknown> = {}) {
    super(message);
    this.name = 'BackupError';
    this.code = code;
    this.details = details;

    // Ensure prototype chain is correct for instanceof checks
    // (required when extending built-in classes in TypeScript)
    Object.setPrototypeOf(this, new.target.prototype);
  }

  override toString(): string {
    return `${this.name}(${this.code}): ${this.message}`;
  }

  static isBackupError(err: unknown): err is BackupError {
    return err instanceof BackupError;
  }
}

/**
 * A single input record failed its required-field checks.
 * Thrown per record; callers drop the record and keep going.
 */
export class ValidationError extends BackupError {
  readonly field: string;

  constructor(message: string, field: string, details: Record<string, unknown> = {}) {
    super('validation_error', message, { field, ...details });
    this.name = 'ValidationError';
    this.field = field;
  }
}

/**
 * An external collaborator call failed.
 * `operation` names the logical call (e.g. "create_pool"), never a raw command line.
 */
export class TransportError extends BackupError {
  readonly operation: string;
  readonly exitCode: number | null;

  constructor(
    operation: string,
    message: string,
    opts: { exitCode?: number | null; cause?: unknown; details?: Record<string, unknown> } = {},
  ) {
    super('transport_error', message, { operation, exitCode: opts.exitCode ?? null, ...opts.details });
    this.name = 'TransportError';
    this.operation = operation;
    this.exitCode = opts.exitCode ?? null;
    if (opts.cause !== undefined) {
      this.cause = opts.cause;
    }
  }
}

/**
 * The pool registry has zero or several active (IsFull=FALSE) records.
 * Never resolved automatically — an operator decides which pool is authoritative.
 */
export class StateInvariantViolation extends BackupError {
  readonly activeCount: number;

  constructor(message: string, activeCount: number, details: Record<string, unknown> = {}) {
    super('state_invariant_violation', message, { activeCount, ...details });
    this.name = 'StateInvariantViolation';
    this.activeCount = activeCount;
  }
}

/** A lifecycle transition that its state machine does not allow. */
export class InvalidTransitionError extends BackupError {
  constructor(message: string, machine: string, from: string, to: string) {
    super('invalid_transition', message, { machine, from, to });
    this.name = 'InvalidTransitionError';
  }
}

export class ConfigError extends BackupError {
  constructor(message: string, variable: string) {
    super('config_error', message, { variable });
    this.name = 'ConfigError';
  }
}
