/**
 * Success Predictor - probability that an application reaches an interview
 *
 * Predictors are consulted in order; a predictor that cannot answer returns
 * null and the next one is asked. The chain always ends with the
 * deterministic formula, so a prediction is always produced.
 *
 * LLM Usage: Optional (AdvisorPredictor)
 */

import { withTimeout } from '@jobscope/core';
import { extractFirstInteger } from '@jobscope/llm';
import type { CandidateProfile, JobPosting, PredictionMode } from '@jobscope/schemas';
import { agentLog } from '../shared/agent-logs.js';
import { clamp } from '../shared/terms.js';
import type { AdvisorContext, LanguageModelAdvisor } from './advisor.js';

export const MIN_DETERMINISTIC_PROBABILITY = 5;
export const DEFAULT_ADVISOR_TIMEOUT_MS = 10_000;

export interface PredictionInput {
  posting: Pick<JobPosting, 'title' | 'company' | 'industry' | 'jobType'>;
  skillMatch: number;
  cultureFit: number;
  candidate: CandidateProfile;
}

export interface Prediction {
  probability: number;
  mode: PredictionMode;
}

export interface SuccessPredictor {
  readonly mode: PredictionMode;
  /** null means "no answer"; the chain moves on to the next predictor. */
  predict(input: PredictionInput): Promise<number | null>;
}

/**
 * rate x 100, scaled by skill and culture fit, with a bonus for a strong
 * skill match; clamped to [5, 100].
 */
export function predictDeterministic(
  skillMatch: number,
  cultureFit: number,
  historicalRate: number,
): number {
  const base = historicalRate * 100;
  const skillMultiplier = 1 + (skillMatch - 50) / 100;
  const cultureMultiplier = 1 + (cultureFit - 50) / 200;
  const transitionBonus = skillMatch > 60 ? 1.1 : 0.9;
  return clamp(
    base * skillMultiplier * cultureMultiplier * transitionBonus,
    MIN_DETERMINISTIC_PROBABILITY,
    100,
  );
}

export class DeterministicPredictor implements SuccessPredictor {
  readonly mode = 'deterministic' as const;

  async predict(input: PredictionInput): Promise<number> {
    return predictDeterministic(
      input.skillMatch,
      input.cultureFit,
      input.candidate.applicationSuccessRate,
    );
  }
}

export function describeBackground(candidate: CandidateProfile): string {
  if (candidate.background) return candidate.background;
  if (candidate.currentRole && candidate.targetRole) {
    return `${candidate.currentRole} moving into ${candidate.targetRole}`;
  }
  return candidate.currentRole ?? candidate.targetRole ?? 'Not provided';
}

export function buildAdvisorContext(input: PredictionInput): AdvisorContext {
  return {
    title: input.posting.title,
    company: input.posting.company,
    industry: input.posting.industry,
    jobType: input.posting.jobType,
    skillMatchScore: input.skillMatch,
    cultureFitScore: input.cultureFit,
    background: describeBackground(input.candidate),
    experienceYears: input.candidate.experienceYears,
    skills: input.candidate.skills,
    historicalSuccessRate: input.candidate.applicationSuccessRate,
  };
}

export class AdvisorPredictor implements SuccessPredictor {
  readonly mode = 'advisor' as const;
  private readonly timeoutMs: number;

  constructor(
    private readonly advisor: LanguageModelAdvisor,
    options: { timeoutMs?: number } = {},
  ) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_ADVISOR_TIMEOUT_MS;
  }

  async predict(input: PredictionInput): Promise<number | null> {
    const context = buildAdvisorContext(input);
    try {
      const reply = await withTimeout(`advisor ${this.advisor.name}`, this.timeoutMs, (signal) =>
        this.advisor.predict(context, signal),
      );
      const value = extractFirstInteger(reply);
      if (value === null) {
        agentLog('SuccessPredictor', 'Advisor reply had no number, falling back', {
          level: 'warn',
          detail: reply.slice(0, 200),
        });
        return null;
      }
      return clamp(value, 0, 100);
    } catch (err) {
      agentLog('SuccessPredictor', `Advisor ${this.advisor.name} failed, falling back`, {
        level: 'warn',
        detail: err instanceof Error ? err.message : String(err),
      });
      return null;
    }
  }
}

export class SuccessPredictorChain {
  private readonly predictors: readonly SuccessPredictor[];
  private readonly fallback = new DeterministicPredictor();

  constructor(predictors: readonly SuccessPredictor[] = []) {
    this.predictors = predictors;
  }

  async predict(input: PredictionInput): Promise<Prediction> {
    for (const predictor of this.predictors) {
      const probability = await predictor.predict(input);
      if (probability !== null) return { probability, mode: predictor.mode };
    }
    return { probability: await this.fallback.predict(input), mode: this.fallback.mode };
  }
}
