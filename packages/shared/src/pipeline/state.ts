/**
 * Pipeline State Machine
 *
 * PENDING → EXTRACTING → CLASSIFYING_AND_SCRAPING → DETECTING_SIGNATURES →
 * RULE_CHECKING → JUDGING → DECIDED, with FAILED reachable from every
 * non-terminal state.
 */

import type { PipelineState } from '../types';

const TRANSITIONS: Readonly<Record<PipelineState, readonly PipelineState[]>> = {
  PENDING: ['EXTRACTING', 'FAILED'],
  EXTRACTING: ['CLASSIFYING_AND_SCRAPING', 'FAILED'],
  CLASSIFYING_AND_SCRAPING: ['DETECTING_SIGNATURES', 'FAILED'],
  DETECTING_SIGNATURES: ['RULE_CHECKING', 'FAILED'],
  RULE_CHECKING: ['JUDGING', 'FAILED'],
  JUDGING: ['DECIDED', 'FAILED'],
  DECIDED: [],
  FAILED: [],
};

export class IllegalTransitionError extends Error {
  constructor(
    readonly from: PipelineState,
    readonly to: PipelineState
  ) {
    super(`Illegal pipeline transition: ${from} -> ${to}`);
    this.name = 'IllegalTransitionError';
  }
}

export function canTransition(from: PipelineState, to: PipelineState): boolean {
  return TRANSITIONS[from].includes(to);
}

export function isTerminalState(state: PipelineState): boolean {
  return TRANSITIONS[state].length === 0;
}

export class PipelineStateMachine {
  private current: PipelineState = 'PENDING';

  get state(): PipelineState {
    return this.current;
  }

  transition(to: PipelineState): void {
    if (!canTransition(this.current, to)) {
      throw new IllegalTransitionError(this.current, to);
    }
    this.current = to;
  }

  isTerminal(): boolean {
    return isTerminalState(this.current);
  }
}
