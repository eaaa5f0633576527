/**
 * Analyze job postings against the candidate profile and print a ranked summary.
 *
 * Run: npx tsx scripts/analyze-jobs.ts <url-or-file> [<url-or-file> ...]
 *      npx tsx scripts/analyze-jobs.ts --apply <url-or-file> [...]   also writes application content
 *      npx tsx scripts/analyze-jobs.ts --history [count]
 */
import './load-env';

import {
  createDocumentFetcher,
  JsonFileAnalysisStore,
  JsonFileApplicationStore,
  JsonFileCompanyStore,
  loadEngineConfig,
  type AnalysisStore,
  type ApplicationStore,
  type CompanyStore,
  type EngineConfig,
} from '@jobscope/core';
import { closeDb, getDb, PgAnalysisStore, PgApplicationStore, PgCompanyStore } from '@jobscope/db';
import { defaultClient, OllamaModels } from '@jobscope/llm';
import {
  AdvisorPredictor,
  AnalysisOrchestrator,
  OllamaAdvisor,
  loadCandidateProfile,
  prepareApplication,
  summarizeAnalysis,
  type SuccessPredictor,
} from '@jobscope/agents';

const RULE = '-'.repeat(72);

interface Stores {
  companyStore: CompanyStore;
  analysisStore: AnalysisStore;
  applicationStore: ApplicationStore;
}

function buildStores(config: EngineConfig): Stores {
  if (config.store === 'postgres') {
    const db = getDb(config.databaseUrl);
    return {
      companyStore: new PgCompanyStore(db),
      analysisStore: new PgAnalysisStore(db),
      applicationStore: new PgApplicationStore(db),
    };
  }
  return {
    companyStore: new JsonFileCompanyStore(config.dataDir),
    analysisStore: new JsonFileAnalysisStore(config.dataDir),
    applicationStore: new JsonFileApplicationStore(config.dataDir),
  };
}

async function buildPredictors(config: EngineConfig): Promise<SuccessPredictor[]> {
  if (config.advisor === 'off') return [];
  const available = await defaultClient.isAvailable(OllamaModels.FAST);
  if (!available) {
    console.warn(`Ollama model ${OllamaModels.FAST} not reachable; using the deterministic predictor.`);
    return [];
  }
  return [new AdvisorPredictor(new OllamaAdvisor('FAST'), { timeoutMs: config.advisorTimeoutMs })];
}

async function printHistory(store: AnalysisStore, count: number): Promise<void> {
  const past = (await store.list()).slice(0, count);
  if (past.length === 0) {
    console.log('No analyses recorded yet.');
    return;
  }
  for (const analysis of past) {
    console.log(`${analysis.analyzedAt}  ${summarizeAnalysis(analysis)}`);
    console.log(RULE);
  }
}

async function main(): Promise<number> {
  const argv = process.argv.slice(2);
  const apply = argv.includes('--apply');
  const args = argv.filter((a) => a !== '--apply');
  if (args.length === 0) {
    console.error('Usage: analyze-jobs [--apply] <url-or-file>... | --history [count]');
    return 1;
  }

  const config = loadEngineConfig();
  const { companyStore, analysisStore, applicationStore } = buildStores(config);

  if (args[0] === '--history') {
    const count = Number.parseInt(args[1] ?? '10', 10);
    await printHistory(analysisStore, Number.isFinite(count) && count > 0 ? count : 10);
    return 0;
  }

  const candidate = await loadCandidateProfile(config.candidateProfilePath);
  const orchestrator = new AnalysisOrchestrator({
    candidate,
    fetcher: createDocumentFetcher({ timeoutMs: config.fetchTimeoutMs }),
    companyStore,
    analysisStore,
    predictors: await buildPredictors(config),
  });

  console.log(`Analyzing ${args.length} posting(s) for ${candidate.name ?? 'candidate'}...`);
  const { ranked, failures, issues } = await orchestrator.analyzeBatch(args, {
    concurrency: config.batchConcurrency,
  });

  for (const { rank, item } of ranked) {
    console.log(RULE);
    console.log(`#${rank}  ${summarizeAnalysis(item.analysis, item.warnings)}`);
    if (item.location) console.log(`Saved to ${item.location}`);
    if (apply) {
      const pkg = prepareApplication(item.analysis, candidate);
      const written = await applicationStore.save(pkg);
      console.log(`Application (${pkg.template}) saved to ${written}`);
    }
  }
  console.log(RULE);

  for (const failure of failures) {
    console.error(`Failed: ${failure.message}`);
  }
  if (failures.length > 0) {
    for (const issue of issues) {
      console.error(`  ${new Date(issue.ts).toISOString()} [${issue.agent}] ${issue.level}: ${issue.message}`);
    }
  }
  return failures.length > 0 ? 1 : 0;
}

main()
  .then(async (code) => {
    await closeDb();
    process.exit(code);
  })
  .catch(async (err) => {
    console.error(err);
    await closeDb();
    process.exit(1);
  });
