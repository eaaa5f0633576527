/**
 * One-screen text summary of an analysis, as printed by the command-line runner.
 */

import type { JobAnalysis } from '@jobscope/schemas';
import type { AnalysisWarning } from './types.js';

export const STATUS_COMPLETE = 'analysis complete';
export const STATUS_PLACEHOLDER = 'could not retrieve posting, showing generic analysis';

function fmt(score: number): string {
  return Number.isInteger(score) ? String(score) : score.toFixed(2);
}

export function analysisStatus(analysis: Pick<JobAnalysis, 'retrievalStatus'>): string {
  return analysis.retrievalStatus === 'placeholder' ? STATUS_PLACEHOLDER : STATUS_COMPLETE;
}

export function summarizeAnalysis(
  analysis: Readonly<JobAnalysis>,
  warnings: readonly AnalysisWarning[] = [],
): string {
  const lines = [
    `${analysis.title} at ${analysis.company} (${analysis.location})`,
    `Source: ${analysis.source} [${analysis.jobId}]`,
    `Status: ${analysisStatus(analysis)}`,
    `Overall rating: ${fmt(analysis.overallRating)} (priority ${analysis.priorityLevel}/5, timing: ${analysis.optimalTiming})`,
    `  Skill match ${fmt(analysis.skillMatchScore)} | Culture fit ${fmt(analysis.cultureFitScore)} | ` +
      `Growth ${fmt(analysis.growthPotentialScore)} | Success ${fmt(analysis.successProbability)} (${analysis.successPredictionMode})`,
    `Strategy: ${analysis.applicationStrategy}`,
    `Follow-up: ${analysis.followUpStrategy}`,
    `Missing skills: ${analysis.requiredSkillsMissing.length > 0 ? analysis.requiredSkillsMissing.join(', ') : 'none'}`,
  ];

  if (analysis.salaryRange) lines.splice(3, 0, `Salary: ${analysis.salaryRange}`);

  if (analysis.competitiveAdvantages.length > 0) {
    lines.push('Advantages:', ...analysis.competitiveAdvantages.map((a) => `  - ${a}`));
  }
  if (warnings.length > 0) {
    lines.push('Warnings:', ...warnings.map((w) => `  - ${w.message}`));
  }
  return lines.join('\n');
}
