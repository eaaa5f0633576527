/**
 * Language-model advisor for the success-probability sub-score.
 *
 * The advisor only ever answers with text; turning that into a number and
 * deciding what to do when it cannot be read is the predictor's job.
 */

import {
  complete,
  createPromptTemplate,
  executeTemplate,
  type OllamaModelType,
} from '@jobscope/llm';
import type { CandidateSkills, Industry, JobType } from '@jobscope/schemas';

export interface AdvisorContext {
  title: string;
  company: string;
  industry: Industry;
  jobType: JobType;
  skillMatchScore: number;
  cultureFitScore: number;
  background: string;
  experienceYears: number;
  skills: CandidateSkills;
  historicalSuccessRate: number;
}

export interface LanguageModelAdvisor {
  readonly name: string;
  predict(context: AdvisorContext, signal?: AbortSignal): Promise<string>;
}

const SUCCESS_PROMPT = createPromptTemplate(
  `Estimate the probability that this application leads to at least an initial interview.

JOB CONTEXT:
- Title: {title}
- Company: {company}
- Industry: {industry}
- Job Type: {jobType}

CANDIDATE:
- Background: {background}
- Experience: {experienceYears} years
- Expert skills: {expertSkills}
- Proficient skills: {proficientSkills}
- Developing skills: {developingSkills}
- Skill Match Score: {skillMatch}%
- Culture Fit Score: {cultureFit}%
- Historical Success Rate: {historicalRate}%

Weigh how the candidate's background fits the role, demand for these skills,
and likely competition for the position.

Reply with a single number between 0 and 100.`,
  { system: 'You are a hiring-market analyst. Answer with a number only.' },
);

function listOrNone(items: readonly string[]): string {
  return items.length > 0 ? items.join(', ') : 'none';
}

export function buildAdvisorPrompt(context: AdvisorContext): { prompt: string; system?: string } {
  return executeTemplate(SUCCESS_PROMPT, {
    title: context.title,
    company: context.company,
    industry: context.industry,
    jobType: context.jobType,
    background: context.background,
    experienceYears: String(context.experienceYears),
    expertSkills: listOrNone(context.skills.expert),
    proficientSkills: listOrNone(context.skills.proficient),
    developingSkills: listOrNone(context.skills.developing),
    skillMatch: context.skillMatchScore.toFixed(1),
    cultureFit: context.cultureFitScore.toFixed(1),
    historicalRate: (context.historicalSuccessRate * 100).toFixed(1),
  });
}

/**
 * Advisor backed by a local Ollama model.
 */
export class OllamaAdvisor implements LanguageModelAdvisor {
  readonly name = 'ollama';

  constructor(private readonly modelType: OllamaModelType = 'FAST') {}

  async predict(context: AdvisorContext, signal?: AbortSignal): Promise<string> {
    const { prompt, system } = buildAdvisorPrompt(context);
    return complete(prompt, this.modelType, { system, signal });
  }
}
