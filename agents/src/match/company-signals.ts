/**
 * Company signal vocabularies and the derivations that read them from posting
 * text. Tables are ordered; where two entries tie, the earlier one wins.
 */

import type { GrowthStage, WorkEnvironment } from '@jobscope/schemas';
import { captureSections } from '../extract/requirements.js';
import { countTerms, findTerms } from '../shared/terms.js';

export const CULTURE_VOCABULARY = [
  'collaborative',
  'innovative',
  'fast-paced',
  'dynamic',
  'flexible',
  'learning',
  'growth',
  'mentorship',
  'autonomous',
  'independent',
  'team-oriented',
  'results-driven',
  'data-driven',
  'customer-focused',
] as const;

export const ENVIRONMENT_INDICATORS: ReadonlyArray<readonly [WorkEnvironment, readonly string[]]> = [
  ['collaborative', ['collaborative', 'team', 'together', 'partnership']],
  ['competitive', ['competitive', 'fast-paced', 'aggressive', 'results-driven']],
  ['innovative', ['innovative', 'creative', 'cutting-edge', 'experimental']],
  ['supportive', ['supportive', 'mentorship', 'learning', 'growth']],
  ['autonomous', ['autonomous', 'independent', 'self-directed', 'ownership']],
];

export const GROWTH_STAGE_BUCKETS: ReadonlyArray<readonly [GrowthStage, readonly string[]]> = [
  ['startup', ['startup', 'early stage', 'seed']],
  ['scale-up', ['scale', 'scaling', 'rapid growth']],
  ['mature', ['established', 'mature', 'leader']],
  ['enterprise', ['enterprise', 'fortune', 'global']],
];

export const TECH_VOCABULARY = [
  'python',
  'javascript',
  'java',
  'c++',
  'golang',
  'rust',
  'react',
  'vue',
  'angular',
  'node',
  'express',
  'aws',
  'azure',
  'gcp',
  'docker',
  'kubernetes',
  'mysql',
  'postgresql',
  'mongodb',
  'redis',
  'tensorflow',
  'pytorch',
  'scikit-learn',
] as const;

export const INNOVATION_MARKERS = [
  'artificial intelligence',
  'machine learning',
  'cutting-edge',
  'innovative',
  'research',
  'r&d',
  'breakthrough',
  'disruptive',
  'next-generation',
  'advanced',
  'emerging',
] as const;

export const MAX_VALUES = 5;

const VALUE_HEADERS: readonly RegExp[] = [/\bvalues?:?\s*/gi, /\bculture:?\s*/gi, /\bwe believe:?\s*/gi];
const VALUE_DELIMITERS = /[,•\n\-]/;

export function findCultureKeywords(lowerText: string): string[] {
  return findTerms(lowerText, CULTURE_VOCABULARY);
}

/** Stated values, original case, 3 to 49 characters each. */
export function findCompanyValues(text: string): string[] {
  const values: string[] = [];
  for (const section of captureSections(text, VALUE_HEADERS)) {
    for (const raw of section.split(VALUE_DELIMITERS)) {
      const item = raw.trim();
      if (item.length < 3 || item.length >= 50 || values.includes(item)) continue;
      values.push(item);
      if (values.length === MAX_VALUES) return values;
    }
  }
  return values;
}

export function classifyWorkEnvironment(lowerText: string): WorkEnvironment {
  let best: WorkEnvironment = 'collaborative';
  let bestHits = 0;
  for (const [environment, indicators] of ENVIRONMENT_INDICATORS) {
    const hits = countTerms(lowerText, indicators);
    if (hits > bestHits) {
      best = environment;
      bestHits = hits;
    }
  }
  return best;
}

export function classifyGrowthStage(lowerText: string): GrowthStage {
  for (const [stage, terms] of GROWTH_STAGE_BUCKETS) {
    if (countTerms(lowerText, terms) > 0) return stage;
  }
  return 'mature';
}

export function findTechStack(lowerText: string): string[] {
  return findTerms(lowerText, TECH_VOCABULARY);
}

export function scoreInnovation(lowerText: string): number {
  const hits = countTerms(lowerText, INNOVATION_MARKERS);
  return Math.min(100, (hits / INNOVATION_MARKERS.length) * 100);
}
