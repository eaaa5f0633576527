/**
 * JSON-on-disk stores.
 *
 * Layout under the data directory:
 *   company_database.json                      one object keyed by company name
 *   job_analysis_<jobId>_<YYYYMMDD_HHMMSS>.json  one file per analysis run
 *   application_<Company>_<YYYYMMDD_HHMMSS>_cover_letter.txt and _package.json
 */

import { mkdir, readFile, readdir, writeFile, rename } from 'fs/promises';
import { existsSync } from 'fs';
import path from 'path';
import {
  applicationPackageSchema,
  jobAnalysisSchema,
  storedCompanyProfileSchema,
  type ApplicationPackage,
  type JobAnalysis,
  type StoredCompanyProfile,
} from '@jobscope/schemas';
import { KeyedMutex } from './keyed-mutex';
import {
  sortNewestFirst,
  type AnalysisStore,
  type ApplicationStore,
  type CompanyStore,
} from './stores';

export const COMPANY_DATABASE_FILE = 'company_database.json';
const ANALYSIS_FILE_PATTERN = /^job_analysis_[0-9a-f]{12}_\d{8}_\d{6}(?:_\d+)?\.json$/;
const PACKAGE_FILE_PATTERN = /^application_\w+_\d{8}_\d{6}(?:_\d+)?_package\.json$/;

export class JsonFileCompanyStore implements CompanyStore {
  private readonly filePath: string;
  private readonly lock = new KeyedMutex();

  constructor(private dataDir: string) {
    this.filePath = path.join(dataDir, COMPANY_DATABASE_FILE);
  }

  async get(name: string): Promise<StoredCompanyProfile | null> {
    const db = await this.readAll();
    return db[name] ?? null;
  }

  async put(name: string, profile: StoredCompanyProfile): Promise<void> {
    // Whole-file read-modify-write; serialized so concurrent puts never drop entries.
    await this.lock.runExclusive('file', async () => {
      const db = await this.readAll();
      db[name] = profile;
      await mkdir(this.dataDir, { recursive: true });
      const tmp = `${this.filePath}.tmp`;
      await writeFile(tmp, JSON.stringify(db, null, 2), 'utf-8');
      await rename(tmp, this.filePath);
    });
  }

  private async readAll(): Promise<Record<string, StoredCompanyProfile>> {
    if (!existsSync(this.filePath)) return {};
    const raw = await readFile(this.filePath, 'utf-8');
    const parsed = parseJson(raw);
    const out: Record<string, StoredCompanyProfile> = {};
    if (!parsed || typeof parsed !== 'object' || Array.isArray(parsed)) return out;

    for (const [name, value] of Object.entries(parsed)) {
      const result = storedCompanyProfileSchema.safeParse(value);
      if (result.success) out[name] = result.data;
    }
    return out;
  }
}

function parseJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return null;
  }
}

/** 2026-03-04T09:08:07.000Z -> 20260304_090807 */
export function timestampSlug(iso: string): string {
  const d = new Date(iso);
  const pad = (n: number) => String(n).padStart(2, '0');
  return (
    `${d.getUTCFullYear()}${pad(d.getUTCMonth() + 1)}${pad(d.getUTCDate())}_` +
    `${pad(d.getUTCHours())}${pad(d.getUTCMinutes())}${pad(d.getUTCSeconds())}`
  );
}

/**
 * Write `body` to the first free `<base>[_N]<suffix>` in `dir`.
 * 'wx' refuses to overwrite; two writes in the same second get a numeric suffix.
 */
async function writeUnique(dir: string, base: string, suffix: string, body: string): Promise<string> {
  for (let attempt = 1; ; attempt++) {
    const fileName = attempt === 1 ? `${base}${suffix}` : `${base}_${attempt}${suffix}`;
    const filePath = path.join(dir, fileName);
    try {
      await writeFile(filePath, body, { encoding: 'utf-8', flag: 'wx' });
      return filePath;
    } catch (err) {
      const code = err instanceof Error && 'code' in err ? err.code : undefined;
      if (code !== 'EEXIST') throw err;
    }
  }
}

export class JsonFileAnalysisStore implements AnalysisStore {
  constructor(private dataDir: string) {}

  async append(analysis: JobAnalysis): Promise<string> {
    await mkdir(this.dataDir, { recursive: true });
    const base = `job_analysis_${analysis.jobId}_${timestampSlug(analysis.analyzedAt)}`;
    return writeUnique(this.dataDir, base, '.json', JSON.stringify(analysis, null, 2));
  }

  async list(): Promise<JobAnalysis[]> {
    if (!existsSync(this.dataDir)) return [];
    const names = (await readdir(this.dataDir)).filter((n) => ANALYSIS_FILE_PATTERN.test(n));
    const records: JobAnalysis[] = [];
    for (const name of names) {
      const raw = await readFile(path.join(this.dataDir, name), 'utf-8');
      const result = jobAnalysisSchema.safeParse(parseJson(raw));
      if (result.success) records.push(result.data);
    }
    return sortNewestFirst(records);
  }
}

/** "Acme Robotics, Inc." -> "Acme_Robotics_Inc"; "unknown" when nothing is left. */
export function companySlug(company: string): string {
  const slug = company
    .replace(/[^\w\s-]/g, '')
    .trim()
    .replace(/[-\s]+/g, '_');
  return slug || 'unknown';
}

export class JsonFileApplicationStore implements ApplicationStore {
  constructor(private dataDir: string) {}

  /** Writes the package JSON, then the cover letter beside it; resolves to the JSON path. */
  async save(pkg: ApplicationPackage): Promise<string> {
    await mkdir(this.dataDir, { recursive: true });
    const base = `application_${companySlug(pkg.company)}_${timestampSlug(pkg.generatedAt)}`;
    const packagePath = await writeUnique(this.dataDir, base, '_package.json', JSON.stringify(pkg, null, 2));
    const letterPath = packagePath.replace(/_package\.json$/, '_cover_letter.txt');
    await writeFile(letterPath, `${pkg.coverLetter}\n`, 'utf-8');
    return packagePath;
  }

  async list(): Promise<ApplicationPackage[]> {
    if (!existsSync(this.dataDir)) return [];
    const names = (await readdir(this.dataDir)).filter((n) => PACKAGE_FILE_PATTERN.test(n));
    const packages: ApplicationPackage[] = [];
    for (const name of names) {
      const raw = await readFile(path.join(this.dataDir, name), 'utf-8');
      const result = applicationPackageSchema.safeParse(parseJson(raw));
      if (result.success) packages.push(result.data);
    }
    return packages.sort((a, b) => b.generatedAt.localeCompare(a.generatedAt));
  }
}
