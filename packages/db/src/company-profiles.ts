import { eq } from 'drizzle-orm';
import type { CompanyStore } from '@jobscope/core';
import { storedCompanyProfileSchema, type StoredCompanyProfile } from '@jobscope/schemas';
import type { Db } from './client';
import { companyProfiles } from './schema';

export async function findCompanyProfile(db: Db, name: string): Promise<StoredCompanyProfile | null> {
  const [row] = await db
    .select({ profile: companyProfiles.profile })
    .from(companyProfiles)
    .where(eq(companyProfiles.name, name))
    .limit(1);
  if (!row) return null;
  // jsonb written by an older build may not match the current shape; treat as a miss.
  const parsed = storedCompanyProfileSchema.safeParse(row.profile);
  return parsed.success ? parsed.data : null;
}

/** Last writer wins. */
export async function upsertCompanyProfile(
  db: Db,
  name: string,
  profile: StoredCompanyProfile,
): Promise<void> {
  const now = new Date();
  await db
    .insert(companyProfiles)
    .values({ name, profile, createdAt: now, updatedAt: now })
    .onConflictDoUpdate({
      target: companyProfiles.name,
      set: { profile, updatedAt: now },
    });
}

export class PgCompanyStore implements CompanyStore {
  constructor(private readonly db: Db) {}

  get(name: string): Promise<StoredCompanyProfile | null> {
    return findCompanyProfile(this.db, name);
  }

  put(name: string, profile: StoredCompanyProfile): Promise<void> {
    return upsertCompanyProfile(this.db, name, profile);
  }
}
