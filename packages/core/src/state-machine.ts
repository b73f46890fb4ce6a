import { DEFAULT_ENGINE_CONFIG } from './config.js';
import type { TaskOutcome } from './task-outcome.js';
import { telemetry } from './telemetry.js';

/**
 * Mutable holder for a task's persisted phase. The driver swaps `current`
 * in place so the caller keeps a single reference across transitions.
 */
export interface MachineState<TPhase> {
  current: TPhase;
}

export interface StateMachineOptions {
  /**
   * Replacements allowed in one invocation.
   *
   * @defaultValue `20`
   */
  readonly maxTransitions?: number;
}

function resolveLimit(options: StateMachineOptions | undefined): number {
  const limit = options?.maxTransitions;
  return limit !== undefined && Number.isInteger(limit) && limit > 0
    ? limit
    : DEFAULT_ENGINE_CONFIG.limits.maxStateTransitions;
}

function reportLimit(label: string, limit: number): void {
  telemetry.recordInvariantViolation('StateMachineTransitionLimit', {
    label,
    limit,
  });
}

/**
 * Runs phase transitions until `tick` yields `undefined` or the ceiling is
 * reached. The phase reached when the ceiling trips is kept and resumed on
 * the next invocation.
 *
 * @returns the number of replacements performed.
 */
export function runStateMachine<TPhase>(
  state: MachineState<TPhase>,
  label: string,
  tick: (phase: TPhase) => TPhase | undefined,
  options?: StateMachineOptions,
): number {
  const limit = resolveLimit(options);
  let transitions = 0;
  let next = tick(state.current);
  while (next !== undefined) {
    state.current = next;
    transitions += 1;
    if (transitions >= limit) {
      reportLimit(label, limit);
      break;
    }
    next = tick(state.current);
  }
  return transitions;
}

/**
 * Fallible form of {@link runStateMachine}. The first failure is returned
 * unchanged; replacements made before it are kept.
 */
export function runStateMachineResult<TPhase>(
  state: MachineState<TPhase>,
  label: string,
  tick: (phase: TPhase) => TaskOutcome<TPhase | undefined>,
  options?: StateMachineOptions,
): TaskOutcome<number> {
  const limit = resolveLimit(options);
  let transitions = 0;
  for (;;) {
    const step = tick(state.current);
    if (!step.success) {
      return step;
    }
    if (step.value === undefined) {
      break;
    }
    state.current = step.value;
    transitions += 1;
    if (transitions >= limit) {
      reportLimit(label, limit);
      break;
    }
  }
  return { success: true, value: transitions };
}
