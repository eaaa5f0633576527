/**
 * Overall rating and batch ranking.
 */

import { roundScore } from '../shared/terms.js';

export interface SubScores {
  skillMatch: number;
  cultureFit: number;
  growthPotential: number;
  successProbability: number;
}

export const OVERALL_WEIGHTS: Readonly<SubScores> = {
  skillMatch: 0.3,
  cultureFit: 0.25,
  growthPotential: 0.25,
  successProbability: 0.2,
};

/** Blend of the (already rounded) sub-scores, rounded to two decimals. */
export function computeOverallRating(scores: SubScores): number {
  return roundScore(
    scores.skillMatch * OVERALL_WEIGHTS.skillMatch +
      scores.cultureFit * OVERALL_WEIGHTS.cultureFit +
      scores.growthPotential * OVERALL_WEIGHTS.growthPotential +
      scores.successProbability * OVERALL_WEIGHTS.successProbability,
  );
}

export interface Ranked<T> {
  rank: number;
  item: T;
}

/**
 * Sort by score, highest first. Equal scores keep input order.
 */
export function rankByScore<T>(
  items: readonly T[],
  scoreOf: (item: T) => number,
  topK?: number,
): Ranked<T>[] {
  const sorted = [...items].sort((a, b) => scoreOf(b) - scoreOf(a));
  const selected = topK === undefined ? sorted : sorted.slice(0, topK);
  return selected.map((item, idx) => ({ rank: idx + 1, item }));
}
