/**
 * Persistence seams for the analysis engine.
 *
 * CompanyStore is a key-value store keyed by company name (case-sensitive).
 * AnalysisStore is append-only: one record per completed run.
 * ApplicationStore keeps every prepared application package.
 */

import type { ApplicationPackage, JobAnalysis, StoredCompanyProfile } from '@jobscope/schemas';

export interface CompanyStore {
  get(name: string): Promise<StoredCompanyProfile | null>;
  put(name: string, profile: StoredCompanyProfile): Promise<void>;
}

export interface AnalysisStore {
  /** Append one analysis; resolves to where it was written. */
  append(analysis: JobAnalysis): Promise<string>;
  /** Past analyses, newest first. */
  list(): Promise<JobAnalysis[]>;
}

export interface ApplicationStore {
  /** Save one package; resolves to where it was written. */
  save(pkg: ApplicationPackage): Promise<string>;
  /** Saved packages, newest first. */
  list(): Promise<ApplicationPackage[]>;
}

export class InMemoryCompanyStore implements CompanyStore {
  private entries = new Map<string, StoredCompanyProfile>();

  async get(name: string): Promise<StoredCompanyProfile | null> {
    const entry = this.entries.get(name);
    return entry ? structuredClone(entry) : null;
  }

  async put(name: string, profile: StoredCompanyProfile): Promise<void> {
    this.entries.set(name, structuredClone(profile));
  }

  get size(): number {
    return this.entries.size;
  }
}

export class InMemoryAnalysisStore implements AnalysisStore {
  private records: JobAnalysis[] = [];

  async append(analysis: JobAnalysis): Promise<string> {
    this.records.push(analysis);
    return `memory:${analysis.jobId}:${analysis.analyzedAt}`;
  }

  async list(): Promise<JobAnalysis[]> {
    return sortNewestFirst(this.records);
  }
}

export function sortNewestFirst(records: JobAnalysis[]): JobAnalysis[] {
  return [...records].sort((a, b) => b.analyzedAt.localeCompare(a.analyzedAt));
}

export class InMemoryApplicationStore implements ApplicationStore {
  private packages: ApplicationPackage[] = [];

  async save(pkg: ApplicationPackage): Promise<string> {
    this.packages.push(structuredClone(pkg));
    return `memory:application:${pkg.jobId}:${pkg.generatedAt}`;
  }

  async list(): Promise<ApplicationPackage[]> {
    return [...this.packages].sort((a, b) => b.generatedAt.localeCompare(a.generatedAt));
  }
}
