import { desc } from 'drizzle-orm';
import type { AnalysisStore } from '@jobscope/core';
import { jobAnalysisSchema, type JobAnalysis } from '@jobscope/schemas';
import type { Db } from './client';
import { jobAnalyses } from './schema';

export async function insertJobAnalysis(db: Db, analysis: JobAnalysis): Promise<string> {
  const [row] = await db
    .insert(jobAnalyses)
    .values({
      jobId: analysis.jobId,
      source: analysis.source,
      analyzedAt: new Date(analysis.analyzedAt),
      overallRating: String(analysis.overallRating),
      analysis,
    })
    .returning({ id: jobAnalyses.id });
  if (!row) throw new Error(`Insert returned no row for job ${analysis.jobId}`);
  return row.id;
}

export async function listJobAnalyses(db: Db, limit = 100): Promise<JobAnalysis[]> {
  const rows = await db
    .select({ analysis: jobAnalyses.analysis })
    .from(jobAnalyses)
    .orderBy(desc(jobAnalyses.analyzedAt))
    .limit(limit);

  const out: JobAnalysis[] = [];
  for (const row of rows) {
    const parsed = jobAnalysisSchema.safeParse(row.analysis);
    if (parsed.success) out.push(parsed.data);
  }
  return out;
}

export class PgAnalysisStore implements AnalysisStore {
  constructor(private readonly db: Db) {}

  async append(analysis: JobAnalysis): Promise<string> {
    const id = await insertJobAnalysis(this.db, analysis);
    return `job_analyses/${id}`;
  }

  list(): Promise<JobAnalysis[]> {
    return listJobAnalyses(this.db);
  }
}
