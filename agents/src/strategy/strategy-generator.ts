/**
 * Strategy Generator - application approach from score thresholds
 *
 * Pure function of the scores and the company profile; every ladder below is
 * evaluated top to bottom and the first satisfied rung wins.
 */

import type { CompanyProfile, OptimalTiming, StrategyTier } from '@jobscope/schemas';

export interface StrategyInput {
  skillMatch: number;
  cultureFit: number;
  overallRating: number;
  profile: Pick<CompanyProfile, 'growthStage' | 'size' | 'cultureMatchScore'>;
}

export interface ApplicationStrategy {
  applicationStrategy: string;
  strategyTier: StrategyTier;
  optimalTiming: OptimalTiming;
  followUpStrategy: string;
  priorityLevel: number;
}

interface TierRung {
  tier: StrategyTier;
  applies: (skillMatch: number, cultureFit: number) => boolean;
  text: string;
}

export const STRATEGY_LADDER: readonly TierRung[] = [
  {
    tier: 'high_priority',
    applies: (skill, culture) => skill >= 80 && culture >= 80,
    text: 'High-priority immediate application: strong fit across skills and culture. Lead with your most relevant results and apply now.',
  },
  {
    tier: 'strategic',
    applies: (skill, culture) => skill >= 60 && culture >= 60,
    text: 'Strategic application: good overall fit. Emphasize transferable skills and learning velocity with specific project examples.',
  },
  {
    tier: 'development',
    applies: (skill) => skill >= 40,
    text: 'Development-focused application: address the skill gaps through targeted learning before applying.',
  },
  {
    tier: 'research',
    applies: () => true,
    text: 'Research and networking approach: the skills gap is too large for now. Build contacts at the company and learn what the role requires.',
  },
];

export const TIMING_LADDER: ReadonlyArray<readonly [number, OptimalTiming]> = [
  [85, 'immediate'],
  [70, 'within_24_hours'],
  [55, 'within_week'],
];

export const PRIORITY_LADDER: ReadonlyArray<readonly [number, number]> = [
  [85, 5],
  [70, 4],
  [55, 3],
  [40, 2],
];

export const FOLLOW_UP = {
  startup: 'Fast follow-up: reach out to the hiring manager within 3-5 days. Startups move quickly.',
  formal: 'Formal follow-up: follow the standard HR process. Follow up after 1 week, then every two weeks.',
  cultural: 'Culture-led follow-up: reference the values you share with the company in each message.',
  standard: 'Standard follow-up: send a professional note after 1 week highlighting your key qualifications.',
} as const;

export function selectStrategyTier(skillMatch: number, cultureFit: number): TierRung {
  const rung = STRATEGY_LADDER.find((r) => r.applies(skillMatch, cultureFit));
  return rung ?? STRATEGY_LADDER[STRATEGY_LADDER.length - 1];
}

export function determineOptimalTiming(overallRating: number): OptimalTiming {
  for (const [threshold, timing] of TIMING_LADDER) {
    if (overallRating >= threshold) return timing;
  }
  return 'after_skill_development';
}

export function determinePriorityLevel(overallRating: number): number {
  for (const [threshold, level] of PRIORITY_LADDER) {
    if (overallRating >= threshold) return level;
  }
  return 1;
}

export function selectFollowUp(profile: StrategyInput['profile']): string {
  if (profile.growthStage === 'startup') return FOLLOW_UP.startup;
  if (profile.size === 'large' || profile.size === 'very_large') return FOLLOW_UP.formal;
  if (profile.cultureMatchScore >= 80) return FOLLOW_UP.cultural;
  return FOLLOW_UP.standard;
}

export function generateStrategy(input: StrategyInput): ApplicationStrategy {
  const rung = selectStrategyTier(input.skillMatch, input.cultureFit);
  return {
    applicationStrategy: rung.text,
    strategyTier: rung.tier,
    optimalTiming: determineOptimalTiming(input.overallRating),
    followUpStrategy: selectFollowUp(input.profile),
    priorityLevel: determinePriorityLevel(input.overallRating),
  };
}
