/**
 * Types for the analysis pipeline
 */

import { z } from 'zod';
import type { JobAnalysis } from '@jobscope/schemas';
import type { AgentLog } from '../shared/types.js';

export const AnalysisStateSchema = z.enum([
  'Fetching',
  'Extracting',
  'Scoring',
  'Strategizing',
  'Persisted',
  'Failed',
]);

export type AnalysisState = z.infer<typeof AnalysisStateSchema>;

export const AnalysisRequestSchema = z.object({
  /** URL or file path; also the job id seed. */
  source: z.string().trim().min(1),
  /** Raw posting supplied by the caller; skips the fetch when present. */
  document: z.string().optional(),
});

export type AnalysisRequest = z.infer<typeof AnalysisRequestSchema>;

export const AnalysisWarningSchema = z.object({
  kind: z.enum(['fetch_failure', 'persistence_failure']),
  message: z.string(),
});

export type AnalysisWarning = z.infer<typeof AnalysisWarningSchema>;

export interface StateTransition {
  from: AnalysisState;
  to: AnalysisState;
  at: string;
}

export interface AnalysisOutcome {
  analysis: Readonly<JobAnalysis>;
  warnings: AnalysisWarning[];
  /** Where the analysis store wrote the record; null when the write failed. */
  location: string | null;
  transitions: StateTransition[];
  logs: AgentLog[];
}
