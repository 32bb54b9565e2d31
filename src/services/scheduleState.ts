// MARK: - Schedule State Machine
// Lifecycle transitions for schedules and the fire-time effect each one has

import { InvalidStateError } from '../utils/errors';
import type { ScheduleKind, ScheduleState } from '../store/types';

export type ScheduleCommand =
  | { type: 'pause' }
  | { type: 'resume' }
  | { type: 'delete' }
  | { type: 'edit'; triggerChanged: boolean }
  | { type: 'fire'; kind: ScheduleKind };

/**
 * What happens to nextFireAt alongside the state change:
 * - keep: leave untouched
 * - freeze: keep the value but exclude it from the due scan
 * - from-now: recompute with "now" as the reference
 * - from-previous: recompute with the previous nextFireAt as the reference
 * - clear: the schedule will never fire again
 */
export type FireTimeEffect = 'keep' | 'freeze' | 'from-now' | 'from-previous' | 'clear';

export type TransitionPlan = {
  state: ScheduleState;
  fireTime: FireTimeEffect;
};

function assertNever(value: never): never {
  throw new Error(`Unhandled schedule command: ${JSON.stringify(value)}`);
}

function isLive(state: ScheduleState): state is 'active' | 'paused' {
  return state === 'active' || state === 'paused';
}

/**
 * Returns the plan for applying `command` to a schedule in `state`, or throws
 * InvalidStateError when the lifecycle forbids it.
 */
export function planTransition(state: ScheduleState, command: ScheduleCommand): TransitionPlan {
  switch (command.type) {
    case 'pause':
      if (state !== 'active') {
        throw new InvalidStateError('pause', state);
      }
      return { state: 'paused', fireTime: 'freeze' };

    case 'resume':
      if (state !== 'paused') {
        throw new InvalidStateError('resume', state);
      }
      return { state: 'active', fireTime: 'from-now' };

    case 'delete':
      if (!isLive(state)) {
        throw new InvalidStateError('delete', state);
      }
      return { state: 'deleted', fireTime: 'keep' };

    case 'edit':
      if (!isLive(state)) {
        throw new InvalidStateError('edit', state);
      }
      return { state, fireTime: command.triggerChanged ? 'from-now' : 'keep' };

    case 'fire':
      if (state !== 'active') {
        throw new InvalidStateError('fire', state);
      }
      return command.kind === 'absolute'
        ? { state: 'completed', fireTime: 'clear' }
        : { state: 'active', fireTime: 'from-previous' };

    default:
      return assertNever(command);
  }
}

/**
 * Only active schedules are ever due
 */
export function isDispatchable(state: ScheduleState): boolean {
  switch (state) {
    case 'active':
      return true;
    case 'paused':
    case 'completed':
    case 'deleted':
      return false;
    default:
      return assertNever(state);
  }
}
