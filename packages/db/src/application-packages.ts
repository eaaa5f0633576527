import { desc } from 'drizzle-orm';
import type { ApplicationStore } from '@jobscope/core';
import { applicationPackageSchema, type ApplicationPackage } from '@jobscope/schemas';
import type { Db } from './client';
import { applicationPackages } from './schema';

export async function insertApplicationPackage(db: Db, pkg: ApplicationPackage): Promise<string> {
  const [row] = await db
    .insert(applicationPackages)
    .values({
      jobId: pkg.jobId,
      company: pkg.company,
      template: pkg.template,
      generatedAt: new Date(pkg.generatedAt),
      package: pkg,
    })
    .returning({ id: applicationPackages.id });
  if (!row) throw new Error(`Insert returned no row for application to ${pkg.company}`);
  return row.id;
}

export async function listApplicationPackages(db: Db, limit = 100): Promise<ApplicationPackage[]> {
  const rows = await db
    .select({ package: applicationPackages.package })
    .from(applicationPackages)
    .orderBy(desc(applicationPackages.generatedAt))
    .limit(limit);

  const out: ApplicationPackage[] = [];
  for (const row of rows) {
    const parsed = applicationPackageSchema.safeParse(row.package);
    if (parsed.success) out.push(parsed.data);
  }
  return out;
}

export class PgApplicationStore implements ApplicationStore {
  constructor(private readonly db: Db) {}

  async save(pkg: ApplicationPackage): Promise<string> {
    const id = await insertApplicationPackage(this.db, pkg);
    return `application_packages/${id}`;
  }

  list(): Promise<ApplicationPackage[]> {
    return listApplicationPackages(this.db);
  }
}
