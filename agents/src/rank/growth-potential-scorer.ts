/**
 * Growth Potential Scorer - weighted categorical lookups
 *
 * 0.3 x growth stage + 0.3 x industry + 0.2 x role level + 0.2 x learning.
 */

import type { GrowthStage, Industry, JobPosting, StoredCompanyProfile } from '@jobscope/schemas';
import { containsAnyTerm } from '../shared/terms.js';

export const GROWTH_WEIGHTS = {
  stage: 0.3,
  industry: 0.3,
  role: 0.2,
  learning: 0.2,
} as const;

const UNLISTED_SCORE = 70;

export const STAGE_SCORES: Readonly<Record<GrowthStage, number>> = {
  startup: 85,
  'scale-up': 90,
  mature: 70,
  enterprise: 60,
};

export const INDUSTRY_SCORES: Readonly<Partial<Record<Industry, number>>> = {
  technology: 85,
  healthcare: 75,
};

const SENIOR_MARKERS = ['senior', 'lead', 'principal'];
const JUNIOR_MARKERS = ['junior', 'entry'];
const LEARNING_MARKERS = ['mentorship', 'learning', 'training', 'development'];

export function roleLevelScore(description: string): number {
  if (containsAnyTerm(description, SENIOR_MARKERS)) return 85;
  if (containsAnyTerm(description, JUNIOR_MARKERS)) return 90;
  return 70;
}

export function learningScore(description: string): number {
  return containsAnyTerm(description, LEARNING_MARKERS) ? 90 : 80;
}

export function scoreGrowthPotential(
  posting: Pick<JobPosting, 'description'>,
  profile: Pick<StoredCompanyProfile, 'growthStage' | 'industry'>,
): number {
  const description = posting.description.toLowerCase();
  const stage = STAGE_SCORES[profile.growthStage] ?? UNLISTED_SCORE;
  const industry = INDUSTRY_SCORES[profile.industry] ?? UNLISTED_SCORE;

  return (
    GROWTH_WEIGHTS.stage * stage +
    GROWTH_WEIGHTS.industry * industry +
    GROWTH_WEIGHTS.role * roleLevelScore(description) +
    GROWTH_WEIGHTS.learning * learningScore(description)
  );
}
