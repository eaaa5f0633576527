/**
 * Company Profiler - derived company intelligence, cached by company name
 *
 * Responsibilities:
 * - Culture keywords, stated values, work environment, growth stage,
 *   tech stack and innovation score from posting text
 * - Cache-first lookups; the candidate-relative culture match is recomputed
 *   on every call and never stored
 * - One writer per company name at a time
 *
 * LLM Usage: None
 */

import { KeyedMutex, type CompanyStore } from '@jobscope/core';
import type {
  CompanyProfile,
  CompanySize,
  Industry,
  StoredCompanyProfile,
} from '@jobscope/schemas';
import { classifyCompanySize, classifyIndustry } from '../extract/classifiers.js';
import { agentLog } from '../shared/agent-logs.js';
import { roundScore } from '../shared/terms.js';
import { scoreCultureFit } from '../rank/culture-fit-scorer.js';
import {
  classifyGrowthStage,
  classifyWorkEnvironment,
  findCompanyValues,
  findCultureKeywords,
  findTechStack,
  scoreInnovation,
} from './company-signals.js';

/** Posting-level classifications reused instead of re-deriving them. */
export interface CompanyHints {
  industry?: Industry;
  size?: CompanySize;
}

export function deriveCompanyProfile(
  companyName: string,
  postingText: string,
  hints: CompanyHints = {},
): StoredCompanyProfile {
  const lower = postingText.toLowerCase();
  return {
    name: companyName,
    values: findCompanyValues(postingText),
    cultureKeywords: findCultureKeywords(lower),
    workEnvironment: classifyWorkEnvironment(lower),
    growthStage: classifyGrowthStage(lower),
    techStack: findTechStack(lower),
    innovationScore: roundScore(scoreInnovation(lower)),
    industry: hints.industry ?? classifyIndustry(lower, companyName),
    size: hints.size ?? classifyCompanySize(lower, companyName),
  };
}

export function withCultureMatch(
  stored: StoredCompanyProfile,
  preferences: readonly string[],
): CompanyProfile {
  return { ...stored, cultureMatchScore: roundScore(scoreCultureFit(stored, preferences)) };
}

export class CompanyProfiler {
  private readonly name = 'CompanyProfiler';

  constructor(
    private readonly store: CompanyStore,
    private readonly mutex: KeyedMutex = new KeyedMutex(),
  ) {}

  async profile(
    companyName: string,
    postingText: string,
    preferences: readonly string[],
    hints: CompanyHints = {},
  ): Promise<CompanyProfile> {
    return this.mutex.runExclusive(companyName, async () => {
      const cached = await this.lookup(companyName);
      if (cached) {
        agentLog(this.name, `Cache hit for ${companyName}`, { level: 'debug' });
        return withCultureMatch(cached, preferences);
      }

      const derived = deriveCompanyProfile(companyName, postingText, hints);
      await this.save(companyName, derived);
      agentLog(this.name, `Profiled ${companyName}`, {
        level: 'debug',
        detail: `${derived.workEnvironment}, ${derived.growthStage}, ${derived.techStack.length} technologies`,
      });
      return withCultureMatch(derived, preferences);
    });
  }

  private async lookup(companyName: string): Promise<StoredCompanyProfile | null> {
    try {
      return await this.store.get(companyName);
    } catch (err) {
      agentLog(this.name, `Company store read failed for ${companyName}, deriving afresh`, {
        level: 'warn',
        detail: err instanceof Error ? err.message : String(err),
      });
      return null;
    }
  }

  private async save(companyName: string, profile: StoredCompanyProfile): Promise<void> {
    try {
      await this.store.put(companyName, profile);
    } catch (err) {
      agentLog(this.name, `Company store write failed for ${companyName}`, {
        level: 'error',
        detail: err instanceof Error ? err.message : String(err),
      });
    }
  }
}
