/**
 * Job Analysis Agent - one posting through the whole pipeline
 *
 * Responsibilities:
 * - Fetch (or accept) the posting; a fetch failure becomes a warning and a
 *   placeholder posting
 * - Extract, score, strategize and persist, moving the run through its states
 * - Report persistence trouble as a warning next to the finished analysis
 *
 * One instance per run: warnings, location and state belong to that run.
 */

import {
  computeJobId,
  DocumentFetchError,
  type AnalysisStore,
  type DocumentFetcher,
} from '@jobscope/core';
import {
  jobAnalysisSchema,
  type CandidateProfile,
  type CompanyProfile,
  type JobAnalysis,
  type JobPosting,
  type RetrievalStatus,
} from '@jobscope/schemas';
import { BaseAgent } from '../shared/base-agent.js';
import type { AgentConfig, AgentContext } from '../shared/types.js';
import { roundScore } from '../shared/terms.js';
import { createPlaceholderPosting, extractJobPosting } from '../extract/job-posting-extractor.js';
import type { CompanyProfiler } from '../match/company-profiler.js';
import { findMissingSkills, scoreSkillMatch } from '../rank/skill-matcher.js';
import { scoreCultureFit } from '../rank/culture-fit-scorer.js';
import { scoreGrowthPotential } from '../rank/growth-potential-scorer.js';
import type { Prediction, SuccessPredictorChain } from '../rank/success-predictor.js';
import { computeOverallRating } from '../rank/scoring.js';
import { generateStrategy } from '../strategy/strategy-generator.js';
import { identifyCompetitiveAdvantages } from '../strategy/competitive-advantages.js';
import { AnalysisRun } from './analysis-run.js';
import { AnalysisFailedError } from './errors.js';
import {
  AnalysisRequestSchema,
  type AnalysisRequest,
  type AnalysisState,
  type AnalysisWarning,
  type StateTransition,
} from './types.js';

export interface JobAnalysisDependencies {
  candidate: CandidateProfile;
  fetcher: DocumentFetcher;
  companyProfiler: CompanyProfiler;
  predictor: SuccessPredictorChain;
  analysisStore: AnalysisStore;
  now: () => Date;
}

interface RetrievedPosting {
  posting: JobPosting;
  retrievalStatus: RetrievalStatus;
}

interface Scores {
  skillMatch: number;
  missing: string[];
  company: CompanyProfile;
  cultureFit: number;
  growthPotential: number;
  prediction: Prediction;
  overallRating: number;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export class JobAnalysisAgent extends BaseAgent<AnalysisRequest, JobAnalysis> {
  config: AgentConfig = {
    name: 'JobAnalysisAgent',
    description: 'Extracts, scores and strategizes a single job posting',
    version: '1.0.0',
  };

  inputSchema = AnalysisRequestSchema;
  outputSchema = jobAnalysisSchema;

  private readonly stage: AnalysisRun;
  private readonly runWarnings: AnalysisWarning[] = [];
  private writtenTo: string | null = null;

  constructor(private readonly deps: JobAnalysisDependencies) {
    super();
    this.stage = new AnalysisRun(deps.now);
  }

  get state(): AnalysisState {
    return this.stage.state;
  }

  get warnings(): AnalysisWarning[] {
    return [...this.runWarnings];
  }

  get location(): string | null {
    return this.writtenTo;
  }

  get transitions(): StateTransition[] {
    return this.stage.transitions;
  }

  /** Move the run to Failed; returns the state it failed in. */
  fail(): AnalysisState {
    return this.stage.fail();
  }

  protected async run(input: AnalysisRequest, _context: AgentContext): Promise<JobAnalysis> {
    const analyzedAt = this.deps.now().toISOString();
    try {
      const { posting, retrievalStatus } = await this.retrieve(input);

      this.stage.transition('Scoring');
      const scores = await this.score(posting);

      this.stage.transition('Strategizing');
      const analysis = this.compose(input.source, analyzedAt, posting, retrievalStatus, scores);

      await this.persist(analysis);
      this.stage.transition('Persisted');
      return analysis;
    } catch (err) {
      if (err instanceof AnalysisFailedError) throw err;
      const failedIn = this.stage.fail();
      throw new AnalysisFailedError(input.source, failedIn, errorMessage(err), { cause: err });
    }
  }

  private async retrieve(input: AnalysisRequest): Promise<RetrievedPosting> {
    let raw: string | null = input.document ?? null;
    if (raw === null) {
      try {
        raw = await this.deps.fetcher.fetch(input.source);
      } catch (err) {
        const kind = err instanceof DocumentFetchError ? err.kind : 'network';
        this.addWarning('fetch_failure', `Could not retrieve posting (${kind}): ${errorMessage(err)}`);
      }
    }

    this.stage.transition('Extracting');
    if (raw === null) {
      return { posting: createPlaceholderPosting(), retrievalStatus: 'placeholder' };
    }
    const posting = extractJobPosting(raw);
    this.debug('Extracted posting', {
      title: posting.title,
      company: posting.company,
      requirements: posting.requirements.length,
    });
    return { posting, retrievalStatus: 'retrieved' };
  }

  private async score(posting: JobPosting): Promise<Scores> {
    const { candidate } = this.deps;
    const synonyms = candidate.skillSynonyms;

    const skillMatch = roundScore(
      scoreSkillMatch(
        candidate.skills,
        [...posting.requirements, ...posting.preferredQualifications],
        synonyms,
      ),
    );
    const missing = findMissingSkills(candidate.skills, posting.requirements, synonyms);

    const company = await this.deps.companyProfiler.profile(
      posting.company,
      posting.displayDescription,
      candidate.culturePreferences,
      { industry: posting.industry, size: posting.companySize },
    );
    const cultureFit = roundScore(scoreCultureFit(company, candidate.culturePreferences));
    const growthPotential = roundScore(scoreGrowthPotential(posting, company));

    const prediction = await this.deps.predictor.predict({
      posting,
      skillMatch,
      cultureFit,
      candidate,
    });
    const successProbability = roundScore(prediction.probability);

    const overallRating = computeOverallRating({
      skillMatch,
      cultureFit,
      growthPotential,
      successProbability,
    });

    this.debug('Scored posting', {
      skillMatch,
      cultureFit,
      growthPotential,
      successProbability,
      mode: prediction.mode,
      overallRating,
    });

    return {
      skillMatch,
      missing,
      company,
      cultureFit,
      growthPotential,
      prediction: { probability: successProbability, mode: prediction.mode },
      overallRating,
    };
  }

  private compose(
    source: string,
    analyzedAt: string,
    posting: JobPosting,
    retrievalStatus: RetrievalStatus,
    scores: Scores,
  ): JobAnalysis {
    const strategy = generateStrategy({
      skillMatch: scores.skillMatch,
      cultureFit: scores.cultureFit,
      overallRating: scores.overallRating,
      profile: scores.company,
    });
    const competitiveAdvantages = identifyCompetitiveAdvantages({
      posting,
      candidate: this.deps.candidate,
      skillMatch: scores.skillMatch,
      company: scores.company,
    });

    return jobAnalysisSchema.parse({
      ...posting,
      jobId: computeJobId(source),
      source,
      analyzedAt,
      skillMatchScore: scores.skillMatch,
      cultureFitScore: scores.cultureFit,
      growthPotentialScore: scores.growthPotential,
      successProbability: scores.prediction.probability,
      overallRating: scores.overallRating,
      requiredSkillsMissing: scores.missing,
      competitiveAdvantages,
      ...strategy,
      successPredictionMode: scores.prediction.mode,
      retrievalStatus,
    });
  }

  private async persist(analysis: JobAnalysis): Promise<void> {
    try {
      this.writtenTo = await this.deps.analysisStore.append(analysis);
      this.info('Analysis saved', { location: this.writtenTo });
    } catch (err) {
      this.addWarning('persistence_failure', `Analysis could not be saved: ${errorMessage(err)}`);
    }
  }

  private addWarning(kind: AnalysisWarning['kind'], message: string): void {
    this.runWarnings.push({ kind, message });
    this.warn(message);
  }
}
