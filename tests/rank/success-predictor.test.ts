import { describe, it, expect, vi } from 'vitest';
import {
  AdvisorPredictor,
  SuccessPredictorChain,
  buildAdvisorPrompt,
  buildAdvisorContext,
  describeBackground,
  predictDeterministic,
  type AdvisorContext,
  type LanguageModelAdvisor,
  type PredictionInput,
} from '@jobscope/agents';
import { candidateProfileSchema, type CandidateProfileInput } from '@jobscope/schemas';

function makeInput(overrides: Partial<PredictionInput> = {}, candidate: Partial<CandidateProfileInput> = {}): PredictionInput {
  return {
    posting: { title: 'Platform Engineer', company: 'Northwind', industry: 'technology', jobType: 'remote' },
    skillMatch: 80,
    cultureFit: 50,
    candidate: candidateProfileSchema.parse({
      skills: { expert: ['python'], proficient: ['aws'] },
      applicationSuccessRate: 0.2,
      ...candidate,
    }),
    ...overrides,
  };
}

function makeAdvisor(reply: (context: AdvisorContext, signal?: AbortSignal) => Promise<string>): LanguageModelAdvisor {
  return { name: 'stub', predict: vi.fn(reply) };
}

describe('predictDeterministic', () => {
  it('scales the historical rate by skill and culture fit', () => {
    // 20 x 1.3 x 1.0 x 1.1
    expect(predictDeterministic(80, 50, 0.2)).toBeCloseTo(28.6, 10);
    // 15 x 0.9 x 1.0 x 0.9
    expect(predictDeterministic(40, 50, 0.15)).toBeCloseTo(12.15, 10);
  });

  it('clamps to [5, 100]', () => {
    expect(predictDeterministic(0, 0, 0.05)).toBe(5);
    expect(predictDeterministic(100, 100, 1)).toBe(100);
  });
});

describe('AdvisorPredictor', () => {
  it('reads the first integer in the reply', async () => {
    const predictor = new AdvisorPredictor(makeAdvisor(async () => 'Probability: 72%'));
    await expect(predictor.predict(makeInput())).resolves.toBe(72);
  });

  it('clamps out-of-range answers', async () => {
    const predictor = new AdvisorPredictor(makeAdvisor(async () => '150'));
    await expect(predictor.predict(makeInput())).resolves.toBe(100);
  });

  it('gives no answer for a reply without a number', async () => {
    const predictor = new AdvisorPredictor(makeAdvisor(async () => 'N/A'));
    await expect(predictor.predict(makeInput())).resolves.toBeNull();
  });

  it('gives no answer when the advisor throws', async () => {
    const predictor = new AdvisorPredictor(
      makeAdvisor(async () => {
        throw new Error('connection refused');
      }),
    );
    await expect(predictor.predict(makeInput())).resolves.toBeNull();
  });

  it('aborts a slow advisor at the deadline', async () => {
    let aborted = false;
    const predictor = new AdvisorPredictor(
      makeAdvisor(
        (_context, signal) =>
          new Promise<string>((_resolve, reject) => {
            signal?.addEventListener('abort', () => {
              aborted = true;
              reject(new Error('aborted'));
            });
          }),
      ),
      { timeoutMs: 20 },
    );
    await expect(predictor.predict(makeInput())).resolves.toBeNull();
    expect(aborted).toBe(true);
  });
});

describe('SuccessPredictorChain', () => {
  it('uses the advisor answer when there is one', async () => {
    const chain = new SuccessPredictorChain([new AdvisorPredictor(makeAdvisor(async () => '64'))]);
    await expect(chain.predict(makeInput())).resolves.toEqual({ probability: 64, mode: 'advisor' });
  });

  it('falls back to the deterministic formula', async () => {
    const chain = new SuccessPredictorChain([new AdvisorPredictor(makeAdvisor(async () => 'N/A'))]);
    const prediction = await chain.predict(makeInput());
    expect(prediction.mode).toBe('deterministic');
    expect(prediction.probability).toBeCloseTo(28.6, 10);
  });

  it('is deterministic with no predictors configured', async () => {
    const chain = new SuccessPredictorChain();
    const prediction = await chain.predict(makeInput({ skillMatch: 40 }, { applicationSuccessRate: 0.15 }));
    expect(prediction).toEqual({ probability: predictDeterministic(40, 50, 0.15), mode: 'deterministic' });
  });
});

describe('advisor prompt', () => {
  it('carries the scores and candidate skills', () => {
    const { prompt, system } = buildAdvisorPrompt(buildAdvisorContext(makeInput()));
    expect(prompt).toContain('- Title: Platform Engineer');
    expect(prompt).toContain('- Expert skills: python');
    expect(prompt).toContain('- Developing skills: none');
    expect(prompt).toContain('- Skill Match Score: 80.0%');
    expect(prompt).toContain('- Historical Success Rate: 20.0%');
    expect(system).toBe('You are a hiring-market analyst. Answer with a number only.');
  });

  it('describes the background from roles when no summary is given', () => {
    const input = makeInput({}, { currentRole: 'Support Engineer', targetRole: 'SRE' });
    expect(describeBackground(input.candidate)).toBe('Support Engineer moving into SRE');
    expect(describeBackground(makeInput().candidate)).toBe('Not provided');
  });
});
