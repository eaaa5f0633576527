/**
 * Analysis run state machine.
 *
 * Fetching -> Extracting -> Scoring -> Strategizing -> Persisted, with Failed
 * reachable from every non-terminal state. Any other move is a defect.
 */

import type { AnalysisState, StateTransition } from './types.js';

export const ANALYSIS_TRANSITIONS: Readonly<Record<AnalysisState, readonly AnalysisState[]>> = {
  Fetching: ['Extracting', 'Failed'],
  Extracting: ['Scoring', 'Failed'],
  Scoring: ['Strategizing', 'Failed'],
  Strategizing: ['Persisted', 'Failed'],
  Persisted: [],
  Failed: [],
};

export class InvalidTransitionError extends Error {
  readonly from: AnalysisState;
  readonly to: AnalysisState;

  constructor(from: AnalysisState, to: AnalysisState) {
    super(`Invalid analysis transition ${from} -> ${to}`);
    this.name = 'InvalidTransitionError';
    this.from = from;
    this.to = to;
  }
}

export function canTransition(from: AnalysisState, to: AnalysisState): boolean {
  return ANALYSIS_TRANSITIONS[from].includes(to);
}

export class AnalysisRun {
  private current: AnalysisState = 'Fetching';
  private readonly history: StateTransition[] = [];

  constructor(private readonly now: () => Date = () => new Date()) {}

  get state(): AnalysisState {
    return this.current;
  }

  get isTerminal(): boolean {
    return ANALYSIS_TRANSITIONS[this.current].length === 0;
  }

  get transitions(): StateTransition[] {
    return [...this.history];
  }

  transition(to: AnalysisState): void {
    if (!canTransition(this.current, to)) {
      throw new InvalidTransitionError(this.current, to);
    }
    this.history.push({ from: this.current, to, at: this.now().toISOString() });
    this.current = to;
  }

  /** Move to Failed unless already terminal; returns the state that failed. */
  fail(): AnalysisState {
    const failedIn = this.current;
    if (!this.isTerminal) this.transition('Failed');
    return failedIn;
  }
}
