/**
 * @jobscope/core — shared infrastructure: ids, fetching, deadlines, locking, stores, config
 */

export { computeJobId, JOB_ID_LENGTH } from './job-id';
export { withTimeout, TimeoutError } from './timeout';
export { KeyedMutex } from './keyed-mutex';
export { mapSettledWithConcurrency } from './pool';
export {
  DocumentFetchError,
  HttpDocumentFetcher,
  FileDocumentFetcher,
  createDocumentFetcher,
  isHttpSource,
  DEFAULT_FETCH_TIMEOUT_MS,
  type DocumentFetcher,
  type FetchFailureKind,
} from './fetcher';
export {
  InMemoryCompanyStore,
  InMemoryAnalysisStore,
  InMemoryApplicationStore,
  sortNewestFirst,
  type CompanyStore,
  type AnalysisStore,
  type ApplicationStore,
} from './stores';
export {
  JsonFileCompanyStore,
  JsonFileAnalysisStore,
  JsonFileApplicationStore,
  companySlug,
  COMPANY_DATABASE_FILE,
  timestampSlug,
} from './file-stores';
export { loadEngineConfig, type EngineConfig } from './config';
