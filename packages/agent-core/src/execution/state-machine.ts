import type { LoopPhase } from '@bugtrail/agent-contracts';
import type { LoopOutcome } from '@bugtrail/agent-sdk';

export type LoopState = LoopPhase | LoopOutcome;

type StateTransition = {
  from: LoopState;
  to: LoopState;
  timestamp: string;
  reason?: string;
};

const TERMINAL: LoopOutcome[] = ['submitted', 'dead_end', 'step_limit', 'aborted', 'failed'];

const ALLOWED_TRANSITIONS: Record<LoopState, LoopState[]> = {
  first_step: ['steady', 'submitted', 'step_limit', 'aborted', 'failed'],
  steady: [...TERMINAL],
  submitted: [],
  dead_end: [],
  step_limit: [],
  aborted: [],
  failed: [],
};

export class LoopStateMachine {
  private current: LoopState = 'first_step';
  private transitions: StateTransition[] = [];

  getCurrent(): LoopState {
    return this.current;
  }

  getTransitions(): StateTransition[] {
    return [...this.transitions];
  }

  isTerminal(): boolean {
    return ALLOWED_TRANSITIONS[this.current].length === 0;
  }

  transition(to: LoopState, reason?: string): void {
    if (to === this.current) {
      return;
    }

    const allowed = ALLOWED_TRANSITIONS[this.current];
    if (!allowed.includes(to)) {
      throw new Error(`Invalid loop transition: ${this.current} -> ${to}`);
    }

    this.transitions.push({
      from: this.current,
      to,
      timestamp: new Date().toISOString(),
      reason,
    });
    this.current = to;
  }
}
