/**
 * Culture Fit Scorer - company profile against candidate culture preferences
 */

import type { StoredCompanyProfile, WorkEnvironment } from '@jobscope/schemas';

const VALUES_WEIGHT = 50;
const KEYWORDS_WEIGHT = 30;
const PREFERRED_ENVIRONMENTS: readonly WorkEnvironment[] = ['collaborative', 'innovative'];
const PREFERRED_ENVIRONMENT_BONUS = 20;
const OTHER_ENVIRONMENT_BONUS = 10;

export type CultureFitInput = Pick<StoredCompanyProfile, 'values' | 'cultureKeywords' | 'workEnvironment'>;

function lowerSet(items: readonly string[]): Set<string> {
  return new Set(items.map((i) => i.trim().toLowerCase()).filter(Boolean));
}

function overlap(a: Set<string>, b: Set<string>): number {
  let n = 0;
  for (const item of a) if (b.has(item)) n++;
  return n;
}

export function scoreCultureFit(profile: CultureFitInput, preferences: readonly string[]): number {
  const prefs = lowerSet(preferences);
  const denominator = Math.max(1, prefs.size);

  const valuesScore = (VALUES_WEIGHT * overlap(prefs, lowerSet(profile.values))) / denominator;
  const keywordScore = (KEYWORDS_WEIGHT * overlap(prefs, lowerSet(profile.cultureKeywords))) / denominator;
  const environmentBonus = PREFERRED_ENVIRONMENTS.includes(profile.workEnvironment)
    ? PREFERRED_ENVIRONMENT_BONUS
    : OTHER_ENVIRONMENT_BONUS;

  return Math.min(100, valuesScore + keywordScore + environmentBonus);
}
