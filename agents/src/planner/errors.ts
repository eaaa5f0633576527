import type { AnalysisState } from './types.js';

/**
 * An analysis run hit an unexpected defect. Fetch, advisor and persistence
 * problems never raise this; they degrade to warnings or fallbacks.
 */
export class AnalysisFailedError extends Error {
  readonly source: string;
  readonly state: AnalysisState;

  constructor(source: string, state: AnalysisState, message: string, options?: { cause?: unknown }) {
    super(`Analysis of ${source} failed while ${state.toLowerCase()}: ${message}`, options);
    this.name = 'AnalysisFailedError';
    this.source = source;
    this.state = state;
  }
}
