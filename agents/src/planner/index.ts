/**
 * Planner - sequences extraction, scoring and strategy into a JobAnalysis
 *
 * - JobAnalysisAgent: one posting, one run, one state machine
 * - AnalysisOrchestrator: single and batch analysis, ranking
 */

export * from './types.js';
export * from './analysis-run.js';
export * from './errors.js';
export * from './job-analysis-agent.js';
export * from './analysis-orchestrator.js';
export * from './summary.js';
