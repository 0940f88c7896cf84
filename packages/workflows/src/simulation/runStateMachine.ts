/**
 * Run state machine
 *
 *   idle → preparing(1) → executing(i) → collecting(i) → archiving(i)
 *        → preparing(i+1) | completed
 *
 * Any active state may go to halted. completed and halted are terminal.
 */

import { AppError } from '@cloverrun/utils';

export type RunPhase = 'preparing' | 'executing' | 'collecting' | 'archiving';

export type RunState =
  | { kind: 'idle' }
  | { kind: RunPhase; iteration: number }
  | { kind: 'halted'; iteration: number; reason: string }
  | { kind: 'completed' };

export class IllegalTransitionError extends AppError {
  constructor(from: RunState, to: RunState) {
    super(
      `Illegal run state transition: ${describeState(from)} -> ${describeState(to)}`,
      'ILLEGAL_TRANSITION',
      500,
      { from, to },
      false
    );
  }
}

export function describeState(state: RunState): string {
  switch (state.kind) {
    case 'idle':
    case 'completed':
      return state.kind;
    default:
      return `${state.kind}(${state.iteration})`;
  }
}

const NEXT_PHASE: Record<RunPhase, RunPhase | null> = {
  preparing: 'executing',
  executing: 'collecting',
  collecting: 'archiving',
  archiving: null,
};

function isActive(state: RunState): state is { kind: RunPhase; iteration: number } {
  return state.kind !== 'idle' && state.kind !== 'halted' && state.kind !== 'completed';
}

export class RunStateMachine {
  private current: RunState = { kind: 'idle' };
  private readonly trail: RunState[] = [{ kind: 'idle' }];

  constructor(readonly total: number) {
    if (!Number.isInteger(total) || total < 1) {
      throw new RangeError(`Iteration count must be a positive integer, got ${total}`);
    }
  }

  get state(): RunState {
    return this.current;
  }

  get history(): readonly RunState[] {
    return this.trail;
  }

  isTerminal(): boolean {
    return this.current.kind === 'halted' || this.current.kind === 'completed';
  }

  canTransition(to: RunState): boolean {
    const from = this.current;

    if (from.kind === 'idle') {
      return to.kind === 'preparing' && to.iteration === 1;
    }
    if (!isActive(from)) {
      return false;
    }
    if (to.kind === 'halted') {
      return to.iteration === from.iteration;
    }

    const next = NEXT_PHASE[from.kind];
    if (next !== null) {
      return isActive(to) && to.kind === next && to.iteration === from.iteration;
    }

    // archiving(i)
    if (from.iteration === this.total) {
      return to.kind === 'completed';
    }
    return to.kind === 'preparing' && to.iteration === from.iteration + 1;
  }

  transition(to: RunState): RunState {
    if (!this.canTransition(to)) {
      throw new IllegalTransitionError(this.current, to);
    }
    this.current = to;
    this.trail.push(to);
    return to;
  }

  /**
   * Halt in the current iteration
   */
  halt(reason: string): RunState {
    const from = this.current;
    if (!isActive(from)) {
      throw new IllegalTransitionError(from, { kind: 'halted', iteration: 0, reason });
    }
    return this.transition({ kind: 'halted', iteration: from.iteration, reason });
  }
}
