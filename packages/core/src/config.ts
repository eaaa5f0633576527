/**
 * Engine configuration loaded from environment variables.
 * Scripts load .env.local / .env first (see scripts/load-env.ts).
 */

import path from 'path';
import { z } from 'zod';
import { DEFAULT_FETCH_TIMEOUT_MS } from './fetcher';

const envSchema = z.object({
  JOBSCOPE_DATA_DIR: z.string().min(1).default('job_intelligence'),
  JOBSCOPE_CANDIDATE_PROFILE: z.string().min(1).optional(),
  JOBSCOPE_STORE: z.enum(['file', 'postgres']).default('file'),
  DATABASE_URL: z.string().min(1).optional(),
  JOBSCOPE_FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_FETCH_TIMEOUT_MS),
  JOBSCOPE_ADVISOR: z.enum(['off', 'ollama']).default('off'),
  JOBSCOPE_ADVISOR_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),
  JOBSCOPE_BATCH_CONCURRENCY: z.coerce.number().int().min(1).max(32).default(4),
});

export interface EngineConfig {
  dataDir: string;
  candidateProfilePath: string;
  store: 'file' | 'postgres';
  databaseUrl?: string;
  fetchTimeoutMs: number;
  advisor: 'off' | 'ollama';
  advisorTimeoutMs: number;
  batchConcurrency: number;
}

export function loadEngineConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`Invalid configuration: ${issues}`);
  }
  const e = parsed.data;
  const dataDir = path.resolve(e.JOBSCOPE_DATA_DIR);

  if (e.JOBSCOPE_STORE === 'postgres' && !e.DATABASE_URL) {
    throw new Error('Invalid configuration: JOBSCOPE_STORE=postgres requires DATABASE_URL');
  }

  return {
    dataDir,
    candidateProfilePath: e.JOBSCOPE_CANDIDATE_PROFILE
      ? path.resolve(e.JOBSCOPE_CANDIDATE_PROFILE)
      : path.join(dataDir, 'candidate_profile.json'),
    store: e.JOBSCOPE_STORE,
    databaseUrl: e.DATABASE_URL,
    fetchTimeoutMs: e.JOBSCOPE_FETCH_TIMEOUT_MS,
    advisor: e.JOBSCOPE_ADVISOR,
    advisorTimeoutMs: e.JOBSCOPE_ADVISOR_TIMEOUT_MS,
    batchConcurrency: e.JOBSCOPE_BATCH_CONCURRENCY,
  };
}
