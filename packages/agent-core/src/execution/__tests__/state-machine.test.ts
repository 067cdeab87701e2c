import { describe, it, expect } from 'vitest';
import { LoopStateMachine } from '../state-machine.js';

describe('LoopStateMachine', () => {
  it('should start in the first step', () => {
    const machine = new LoopStateMachine();

    expect(machine.getCurrent()).toBe('first_step');
    expect(machine.isTerminal()).toBe(false);
  });

  it('should record transitions with their reason', () => {
    const machine = new LoopStateMachine();

    machine.transition('steady');
    machine.transition('dead_end', 'Operation #0 was rejected 3 times in a row');

    expect(machine.getCurrent()).toBe('dead_end');
    expect(machine.isTerminal()).toBe(true);
    expect(machine.getTransitions().map(({ from, to, reason }) => ({ from, to, reason }))).toEqual([
      { from: 'first_step', to: 'steady', reason: undefined },
      { from: 'steady', to: 'dead_end', reason: 'Operation #0 was rejected 3 times in a row' },
    ]);
  });

  it('should treat a transition to the current state as a no-op', () => {
    const machine = new LoopStateMachine();
    machine.transition('steady');
    machine.transition('steady');

    expect(machine.getTransitions()).toHaveLength(1);
  });

  it('should reject a dead end before any operation was judged', () => {
    const machine = new LoopStateMachine();

    expect(() => machine.transition('dead_end')).toThrow('Invalid loop transition: first_step -> dead_end');
  });

  it('should not leave a terminal state', () => {
    const machine = new LoopStateMachine();
    machine.transition('submitted');

    expect(() => machine.transition('steady')).toThrow('Invalid loop transition: submitted -> steady');
  });
});
