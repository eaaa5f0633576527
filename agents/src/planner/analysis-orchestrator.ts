/**
 * Analysis Orchestrator - runs postings through the pipeline
 *
 * Responsibilities:
 * - One JobAnalysisAgent per posting, sharing the company profiler, the
 *   success predictor chain and the stores
 * - Batches with bounded concurrency, ranked by overall rating once every
 *   run has settled
 *
 * Only defects reject; fetch, advisor and persistence trouble come back as
 * warnings or fallbacks on a complete analysis.
 */

import {
  computeJobId,
  mapSettledWithConcurrency,
  type AnalysisStore,
  type CompanyStore,
  type DocumentFetcher,
} from '@jobscope/core';
import type { CandidateProfile, JobAnalysis } from '@jobscope/schemas';
import { agentLog, getAgentLogs, type AgentLogEntry } from '../shared/agent-logs.js';
import { CompanyProfiler } from '../match/company-profiler.js';
import { SuccessPredictorChain, type SuccessPredictor } from '../rank/success-predictor.js';
import { rankByScore, type Ranked } from '../rank/scoring.js';
import { JobAnalysisAgent } from './job-analysis-agent.js';
import { AnalysisFailedError } from './errors.js';
import type { AnalysisOutcome, AnalysisRequest } from './types.js';

export const DEFAULT_BATCH_CONCURRENCY = 4;

export interface AnalysisOrchestratorOptions {
  candidate: CandidateProfile;
  fetcher: DocumentFetcher;
  companyStore: CompanyStore;
  analysisStore: AnalysisStore;
  /** Consulted before the deterministic formula, in order. */
  predictors?: readonly SuccessPredictor[];
  now?: () => Date;
}

export interface BatchOutcome {
  ranked: Ranked<AnalysisOutcome>[];
  failures: AnalysisFailedError[];
  /** Warnings and errors logged while the batch ran. */
  issues: AgentLogEntry[];
}

/** Analysis with its lists frozen too; results are never mutated after construction. */
export function freezeAnalysis(analysis: JobAnalysis): Readonly<JobAnalysis> {
  Object.freeze(analysis.requirements);
  Object.freeze(analysis.preferredQualifications);
  Object.freeze(analysis.requiredSkillsMissing);
  Object.freeze(analysis.competitiveAdvantages);
  return Object.freeze(analysis);
}

function toRequest(request: AnalysisRequest | string): AnalysisRequest {
  return typeof request === 'string' ? { source: request } : request;
}

export class AnalysisOrchestrator {
  private readonly companyProfiler: CompanyProfiler;
  private readonly predictor: SuccessPredictorChain;
  private readonly now: () => Date;

  constructor(private readonly options: AnalysisOrchestratorOptions) {
    this.companyProfiler = new CompanyProfiler(options.companyStore);
    this.predictor = new SuccessPredictorChain(options.predictors ?? []);
    this.now = options.now ?? (() => new Date());
  }

  async analyze(request: AnalysisRequest | string): Promise<AnalysisOutcome> {
    const input = toRequest(request);
    const agent = new JobAnalysisAgent({
      candidate: this.options.candidate,
      fetcher: this.options.fetcher,
      companyProfiler: this.companyProfiler,
      predictor: this.predictor,
      analysisStore: this.options.analysisStore,
      now: this.now,
    });

    const result = await agent.execute(input, {
      runId: `${computeJobId(input.source)}-${this.now().getTime()}`,
      metadata: { source: input.source },
    });

    if (!result.success) {
      if (result.cause instanceof AnalysisFailedError) throw result.cause;
      const failedIn = agent.fail();
      throw new AnalysisFailedError(input.source, failedIn, result.error, {
        cause: result.cause,
      });
    }

    return {
      analysis: freezeAnalysis(result.data),
      warnings: agent.warnings,
      location: agent.location,
      transitions: agent.transitions,
      logs: agent.getLogs(),
    };
  }

  async analyzeBatch(
    requests: ReadonlyArray<AnalysisRequest | string>,
    options: { concurrency?: number } = {},
  ): Promise<BatchOutcome> {
    const concurrency = options.concurrency ?? DEFAULT_BATCH_CONCURRENCY;
    const mark = agentLog('AnalysisOrchestrator', `Batch started: ${requests.length} posting(s)`, {
      level: 'debug',
    });
    const settled = await mapSettledWithConcurrency(requests, concurrency, (request) =>
      this.analyze(request),
    );

    const outcomes: AnalysisOutcome[] = [];
    const failures: AnalysisFailedError[] = [];
    settled.forEach((result, idx) => {
      if (result.status === 'fulfilled') {
        outcomes.push(result.value);
        return;
      }
      const source = toRequest(requests[idx]).source;
      failures.push(
        result.reason instanceof AnalysisFailedError
          ? result.reason
          : new AnalysisFailedError(source, 'Fetching', String(result.reason), { cause: result.reason }),
      );
    });

    agentLog('AnalysisOrchestrator', `Batch finished: ${outcomes.length} analyzed, ${failures.length} failed`, {
      level: failures.length > 0 ? 'warn' : 'info',
    });

    return {
      ranked: rankByScore(outcomes, (o) => o.analysis.overallRating),
      failures,
      issues: getAgentLogs(mark.id).filter((e) => e.level === 'warn' || e.level === 'error'),
    };
  }
}
