import { describe, it, expect, vi } from 'vitest';
import {
  CompanyProfiler,
  classifyGrowthStage,
  classifyWorkEnvironment,
  deriveCompanyProfile,
  findCompanyValues,
  findCultureKeywords,
  findTechStack,
  scoreInnovation,
} from '@jobscope/agents';
import { InMemoryCompanyStore, type CompanyStore } from '@jobscope/core';

const POSTING = `About Northwind
We are a collaborative, fast-paced startup working with Python, React and AWS.

Our values: Integrity, Curiosity, Ownership

Mentorship and learning are part of every week.`;

describe('company signals', () => {
  it('reads stated values in their original case', () => {
    expect(findCompanyValues(POSTING)).toEqual(['Integrity', 'Curiosity', 'Ownership']);
  });

  it('caps values at five', () => {
    expect(findCompanyValues('Values: Alpha, Bravo, Charlie, Delta, Echo, Foxtrot')).toEqual([
      'Alpha',
      'Bravo',
      'Charlie',
      'Delta',
      'Echo',
    ]);
  });

  it('finds culture keywords in vocabulary order', () => {
    expect(findCultureKeywords(POSTING.toLowerCase())).toEqual([
      'collaborative',
      'fast-paced',
      'learning',
      'mentorship',
    ]);
  });

  it('picks the environment with the most indicators', () => {
    expect(classifyWorkEnvironment('supportive mentorship and learning for a team')).toBe('supportive');
  });

  it('keeps the earlier environment on a tie', () => {
    expect(classifyWorkEnvironment('a creative team')).toBe('collaborative');
  });

  it('classifies growth stage, defaulting to mature', () => {
    expect(classifyGrowthStage('startup')).toBe('startup');
    expect(classifyGrowthStage('we are scaling quickly')).toBe('scale-up');
    expect(classifyGrowthStage('a small shop')).toBe('mature');
  });

  it('lists technologies in vocabulary order', () => {
    expect(findTechStack('services in golang and node.js on aws')).toEqual(['golang', 'node', 'aws']);
  });

  it('finds technologies inside longer words', () => {
    expect(findTechStack('postgresql and mysql replicas')).toEqual(['mysql', 'postgresql']);
  });

  it('scores innovation as a share of markers present', () => {
    // 2 of 11 markers
    expect(scoreInnovation('machine learning research')).toBeCloseTo((2 / 11) * 100, 10);
  });
});

describe('deriveCompanyProfile', () => {
  it('derives every signal and honours posting hints', () => {
    const profile = deriveCompanyProfile('Northwind', POSTING, { industry: 'finance', size: 'small' });
    expect(profile).toEqual({
      name: 'Northwind',
      values: ['Integrity', 'Curiosity', 'Ownership'],
      cultureKeywords: ['collaborative', 'fast-paced', 'learning', 'mentorship'],
      workEnvironment: 'supportive',
      growthStage: 'startup',
      techStack: ['python', 'react', 'aws'],
      innovationScore: 0,
      industry: 'finance',
      size: 'small',
    });
  });
});

describe('CompanyProfiler', () => {
  it('stores a derived profile on first sight and reuses it afterwards', async () => {
    const store = new InMemoryCompanyStore();
    const profiler = new CompanyProfiler(store);

    const first = await profiler.profile('Northwind', POSTING, ['integrity']);
    const second = await profiler.profile('Northwind', 'a completely different posting', ['integrity']);

    expect(store.size).toBe(1);
    expect(second).toEqual(first);
  });

  it('recomputes the culture match for each caller', async () => {
    const profiler = new CompanyProfiler(new InMemoryCompanyStore());
    const withPreference = await profiler.profile('Northwind', POSTING, ['integrity']);
    const withoutPreference = await profiler.profile('Northwind', POSTING, []);

    // 50 x 1/1 + 0 + 10 (supportive)
    expect(withPreference.cultureMatchScore).toBe(60);
    expect(withoutPreference.cultureMatchScore).toBe(10);
  });

  it('derives each company once under concurrent requests', async () => {
    const store = new InMemoryCompanyStore();
    const put = vi.spyOn(store, 'put');
    const profiler = new CompanyProfiler(store);

    await Promise.all([
      profiler.profile('Northwind', POSTING, []),
      profiler.profile('Northwind', POSTING, []),
      profiler.profile('Contoso', POSTING, []),
    ]);

    expect(put).toHaveBeenCalledTimes(2);
  });

  it('keeps working when the store fails', async () => {
    const failing: CompanyStore = {
      get: async () => {
        throw new Error('store offline');
      },
      put: async () => {
        throw new Error('store offline');
      },
    };
    const profile = await new CompanyProfiler(failing).profile('Northwind', POSTING, []);
    expect(profile.name).toBe('Northwind');
    expect(profile.growthStage).toBe('startup');
  });
});
