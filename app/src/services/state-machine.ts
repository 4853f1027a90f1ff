/**
 * State Machine Validation — runtime-checked lifecycle transitions.
 *
 * Transition maps for: PoolLifecycle (registry records) and CyclePhase
 * (the backup cycle's progress). Invalid transitions are rejected with an
 * InvalidTransitionError; `validateTransition` never throws.
 */
import { InvalidTransitionError } from '../errors.js';

/** Generic state machine definition */
export interface StateMachine<S extends string> {
  readonly name: string;
  readonly initial: S;
  readonly transitions: Record<S, readonly S[]>;
}

/** Validation result */
export interface TransitionResult {
  readonly valid: boolean;
  readonly from: string;
  readonly to: string;
  readonly machine: string;
  readonly error?: string;
}

/**
 * Validate a state transition against a state machine definition.
 * Returns a TransitionResult — never throws.
 */
export function validateTransition<S extends string>(
  machine: StateMachine<S>,
  from: S,
  to: S,
): TransitionResult {
  const allowed: readonly S[] | undefined = machine.transitions[from];
  if (!allowed) {
    return {
      valid: false,
      from,
      to,
      machine: machine.name,
      error: `Unknown state '${from}' in ${machine.name}`,
    };
  }

  if (!allowed.includes(to)) {
    return {
      valid: false,
      from,
      to,
      machine: machine.name,
      error: `Invalid transition ${from} → ${to} in ${machine.name}. Allowed: [${allowed.join(', ')}]`,
    };
  }

  return { valid: true, from, to, machine: machine.name };
}

/**
 * Assert a valid transition — throws if invalid.
 */
export function assertTransition<S extends string>(
  machine: StateMachine<S>,
  from: S,
  to: S,
): void {
  const result = validateTransition(machine, from, to);
  if (!result.valid) {
    throw new InvalidTransitionError(result.error ?? 'invalid transition', machine.name, from, to);
  }
}

// --- State Machine Definitions ---

/**
 * Pool record lifecycle. A pool is created active and frozen exactly once,
 * when its successor is registered. Frozen pools never reactivate.
 */
export type PoolState = 'active' | 'full';

export const PoolLifecycleMachine: StateMachine<PoolState> = {
  name: 'PoolLifecycle',
  initial: 'active',
  transitions: {
    active: ['full'],
    full: [], // terminal
  },
};

export function poolState(record: { readonly isFull: boolean }): PoolState {
  return record.isFull ? 'full' : 'active';
}

/**
 * Backup cycle phases. Projection happens before anything is persisted so a
 * failed measurement leaves stored state untouched.
 */
export type CyclePhase =
  | 'loading'
  | 'planning'
  | 'projecting'
  | 'persisting'
  | 'rotating'
  | 'copying'
  | 'completed'
  | 'failed';

export const CyclePhaseMachine: StateMachine<CyclePhase> = {
  name: 'CyclePhase',
  initial: 'loading',
  transitions: {
    loading: ['planning', 'failed'],
    planning: ['projecting', 'failed'],
    projecting: ['persisting', 'completed', 'failed'], // completed: dry run
    persisting: ['rotating', 'failed'],
    rotating: ['copying', 'completed', 'failed'],
    copying: ['completed', 'failed'],
    completed: [], // terminal
    failed: [], // terminal
  },
};
