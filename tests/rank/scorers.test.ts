import { describe, it, expect } from 'vitest';
import {
  computeOverallRating,
  INDUSTRY_SCORES,
  learningScore,
  rankByScore,
  roleLevelScore,
  scoreCultureFit,
  scoreGrowthPotential,
  type CultureFitInput,
} from '@jobscope/agents';

function makeCulture(overrides: Partial<CultureFitInput> = {}): CultureFitInput {
  return {
    values: ['Integrity', 'Customer Obsession'],
    cultureKeywords: ['collaborative', 'learning'],
    workEnvironment: 'collaborative',
    ...overrides,
  };
}

describe('scoreCultureFit', () => {
  it('blends value overlap, keyword overlap and the environment bonus', () => {
    // 50 x 1/3 + 30 x 1/3 + 20
    expect(scoreCultureFit(makeCulture(), ['integrity', 'learning', 'remote-first'])).toBeCloseTo(46.667, 3);
  });

  it('compares case-insensitively', () => {
    expect(scoreCultureFit(makeCulture(), ['INTEGRITY'])).toBe(70);
  });

  it('gives only the environment bonus without preferences', () => {
    expect(scoreCultureFit(makeCulture({ workEnvironment: 'competitive' }), [])).toBe(10);
    expect(scoreCultureFit(makeCulture({ workEnvironment: 'innovative' }), [])).toBe(20);
  });

  it('caps at 100', () => {
    const culture = makeCulture({ values: ['ownership'], cultureKeywords: ['ownership'] });
    expect(scoreCultureFit(culture, ['ownership'])).toBe(100);
  });
});

describe('scoreGrowthPotential', () => {
  it('weights stage, industry, role level and learning', () => {
    const score = scoreGrowthPotential(
      { description: 'senior engineer with mentorship' },
      { growthStage: 'scale-up', industry: 'technology' },
    );
    expect(score).toBeCloseTo(87.5, 10);
  });

  it('scores junior roles above senior ones', () => {
    expect(roleLevelScore('junior analyst')).toBe(90);
    expect(roleLevelScore('team lead')).toBe(85);
    expect(roleLevelScore('analyst')).toBe(70);
  });

  it('uses the unlisted score for industries outside the table', () => {
    const score = scoreGrowthPotential(
      { description: 'analyst' },
      { growthStage: 'mature', industry: 'consulting' },
    );
    // 0.3 x 70 + 0.3 x 70 + 0.2 x 70 + 0.2 x 80
    expect(score).toBeCloseTo(72, 10);
    expect(learningScore('analyst')).toBe(80);
  });

  it('scores finance like any other unlisted industry', () => {
    const finance = scoreGrowthPotential({ description: 'analyst' }, { growthStage: 'mature', industry: 'finance' });
    expect(finance).toBeCloseTo(72, 10);
    expect(INDUSTRY_SCORES.finance).toBeUndefined();
  });
});

describe('computeOverallRating', () => {
  it('applies the fixed weights', () => {
    expect(
      computeOverallRating({ skillMatch: 80, cultureFit: 60, growthPotential: 80, successProbability: 50 }),
    ).toBe(69);
  });

  it('rounds to two decimals', () => {
    expect(
      computeOverallRating({ skillMatch: 33.33, cultureFit: 0, growthPotential: 0, successProbability: 0 }),
    ).toBe(10);
  });
});

describe('rankByScore', () => {
  const items = [
    { id: 'a', score: 50 },
    { id: 'b', score: 70 },
    { id: 'c', score: 50 },
  ];

  it('sorts highest first and keeps input order on ties', () => {
    expect(rankByScore(items, (i) => i.score).map((r) => [r.rank, r.item.id])).toEqual([
      [1, 'b'],
      [2, 'a'],
      [3, 'c'],
    ]);
  });

  it('limits to the top k', () => {
    expect(rankByScore(items, (i) => i.score, 2).map((r) => r.item.id)).toEqual(['b', 'a']);
  });
});
