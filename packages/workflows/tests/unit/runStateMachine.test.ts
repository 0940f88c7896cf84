import { describe, it, expect } from 'vitest';
import {
  IllegalTransitionError,
  RunStateMachine,
  describeState,
} from '../../src/simulation/runStateMachine.js';

function walkIteration(machine: RunStateMachine, iteration: number): void {
  machine.transition({ kind: 'preparing', iteration });
  machine.transition({ kind: 'executing', iteration });
  machine.transition({ kind: 'collecting', iteration });
  machine.transition({ kind: 'archiving', iteration });
}

describe('RunStateMachine', () => {
  it('should start idle', () => {
    const machine = new RunStateMachine(2);
    expect(machine.state).toEqual({ kind: 'idle' });
    expect(machine.isTerminal()).toBe(false);
  });

  it('should walk every iteration in order to completion', () => {
    const machine = new RunStateMachine(2);
    walkIteration(machine, 1);
    walkIteration(machine, 2);
    machine.transition({ kind: 'completed' });

    expect(machine.isTerminal()).toBe(true);
    expect(machine.history.map(describeState)).toEqual([
      'idle',
      'preparing(1)',
      'executing(1)',
      'collecting(1)',
      'archiving(1)',
      'preparing(2)',
      'executing(2)',
      'collecting(2)',
      'archiving(2)',
      'completed',
    ]);
  });

  it('should only start at iteration 1', () => {
    const machine = new RunStateMachine(3);
    expect(machine.canTransition({ kind: 'preparing', iteration: 2 })).toBe(false);
    expect(() => machine.transition({ kind: 'executing', iteration: 1 })).toThrow(
      'Illegal run state transition: idle -> executing(1)'
    );
  });

  it('should not skip phases', () => {
    const machine = new RunStateMachine(1);
    machine.transition({ kind: 'preparing', iteration: 1 });
    expect(machine.canTransition({ kind: 'collecting', iteration: 1 })).toBe(false);
    expect(machine.canTransition({ kind: 'executing', iteration: 2 })).toBe(false);
  });

  it('should not complete before the last iteration', () => {
    const machine = new RunStateMachine(2);
    walkIteration(machine, 1);
    expect(machine.canTransition({ kind: 'completed' })).toBe(false);
    expect(machine.canTransition({ kind: 'preparing', iteration: 3 })).toBe(false);
    expect(machine.canTransition({ kind: 'preparing', iteration: 2 })).toBe(true);
  });

  it('should halt in the current iteration from any active phase', () => {
    const machine = new RunStateMachine(3);
    walkIteration(machine, 1);
    machine.transition({ kind: 'preparing', iteration: 2 });
    machine.transition({ kind: 'executing', iteration: 2 });

    expect(machine.halt('no marker')).toEqual({ kind: 'halted', iteration: 2, reason: 'no marker' });
    expect(machine.isTerminal()).toBe(true);
  });

  it('should reject a halt for another iteration', () => {
    const machine = new RunStateMachine(3);
    machine.transition({ kind: 'preparing', iteration: 1 });
    expect(machine.canTransition({ kind: 'halted', iteration: 2, reason: 'x' })).toBe(false);
  });

  it('should go nowhere from a terminal state', () => {
    const machine = new RunStateMachine(1);
    machine.transition({ kind: 'preparing', iteration: 1 });
    machine.halt('broken');

    expect(machine.canTransition({ kind: 'preparing', iteration: 2 })).toBe(false);
    expect(() => machine.halt('again')).toThrow(IllegalTransitionError);
  });

  it('should refuse to halt before starting', () => {
    const machine = new RunStateMachine(1);
    expect(() => machine.halt('early')).toThrow('Illegal run state transition: idle -> halted(0)');
  });

  it('should carry both states on the error', () => {
    const machine = new RunStateMachine(1);
    try {
      machine.transition({ kind: 'completed' });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(IllegalTransitionError);
      if (error instanceof IllegalTransitionError) {
        expect(error.code).toBe('ILLEGAL_TRANSITION');
        expect(error.isOperational).toBe(false);
        expect(error.context).toEqual({ from: { kind: 'idle' }, to: { kind: 'completed' } });
      }
    }
  });

  it('should reject a non-positive iteration count', () => {
    expect(() => new RunStateMachine(0)).toThrow(RangeError);
  });
});
