import { describe, it, expect } from 'vitest';
import { AnalysisRun, InvalidTransitionError, canTransition } from '@jobscope/agents';

const AT = new Date('2026-03-04T09:08:07.000Z');

describe('AnalysisRun', () => {
  it('starts in Fetching', () => {
    const run = new AnalysisRun(() => AT);
    expect(run.state).toBe('Fetching');
    expect(run.isTerminal).toBe(false);
  });

  it('records each transition with its time', () => {
    const run = new AnalysisRun(() => AT);
    run.transition('Extracting');
    run.transition('Scoring');
    expect(run.transitions).toEqual([
      { from: 'Fetching', to: 'Extracting', at: '2026-03-04T09:08:07.000Z' },
      { from: 'Extracting', to: 'Scoring', at: '2026-03-04T09:08:07.000Z' },
    ]);
  });

  it('rejects skipped states', () => {
    const run = new AnalysisRun(() => AT);
    expect(() => run.transition('Scoring')).toThrow(InvalidTransitionError);
    expect(() => run.transition('Scoring')).toThrow('Invalid analysis transition Fetching -> Scoring');
    expect(run.state).toBe('Fetching');
  });

  it('fails from any non-terminal state and reports where', () => {
    const run = new AnalysisRun(() => AT);
    run.transition('Extracting');
    expect(run.fail()).toBe('Extracting');
    expect(run.state).toBe('Failed');
    expect(run.isTerminal).toBe(true);
  });

  it('leaves a terminal run alone', () => {
    const run = new AnalysisRun(() => AT);
    run.transition('Extracting');
    run.transition('Scoring');
    run.transition('Strategizing');
    run.transition('Persisted');
    expect(run.fail()).toBe('Persisted');
    expect(run.state).toBe('Persisted');
  });
});

describe('canTransition', () => {
  it('allows only forward moves and Failed', () => {
    expect(canTransition('Scoring', 'Strategizing')).toBe(true);
    expect(canTransition('Scoring', 'Failed')).toBe(true);
    expect(canTransition('Scoring', 'Extracting')).toBe(false);
    expect(canTransition('Failed', 'Fetching')).toBe(false);
  });
});
