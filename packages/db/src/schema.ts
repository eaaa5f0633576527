import {
  pgTable,
  uuid,
  text,
  varchar,
  timestamp,
  jsonb,
  decimal,
  uniqueIndex,
  index,
} from 'drizzle-orm/pg-core';
import type { ApplicationPackage, JobAnalysis, StoredCompanyProfile } from '@jobscope/schemas';

// Company profiles, keyed by company name as first seen (case-sensitive).
export const companyProfiles = pgTable('company_profiles', {
  name: varchar('name', { length: 255 }).primaryKey(),
  profile: jsonb('profile').$type<StoredCompanyProfile>().notNull(),
  createdAt: timestamp('created_at').defaultNow().notNull(),
  updatedAt: timestamp('updated_at').defaultNow().notNull(),
});

// Append-only: one row per analysis run.
export const jobAnalyses = pgTable(
  'job_analyses',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    jobId: varchar('job_id', { length: 12 }).notNull(),
    source: text('source').notNull(),
    analyzedAt: timestamp('analyzed_at', { withTimezone: true }).notNull(),
    overallRating: decimal('overall_rating', { precision: 5, scale: 2 }).notNull(),
    analysis: jsonb('analysis').$type<JobAnalysis>().notNull(),
    createdAt: timestamp('created_at').defaultNow().notNull(),
  },
  (table) => ({
    jobAnalysesRunIdx: uniqueIndex('job_analyses_job_id_analyzed_at_idx').on(
      table.jobId,
      table.analyzedAt,
    ),
    jobAnalysesAnalyzedAtIdx: index('job_analyses_analyzed_at_idx').on(table.analyzedAt),
  }),
);

// Prepared application content, one row per package.
export const applicationPackages = pgTable(
  'application_packages',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    jobId: varchar('job_id', { length: 12 }).notNull(),
    company: varchar('company', { length: 255 }).notNull(),
    template: varchar('template', { length: 32 }).notNull(),
    generatedAt: timestamp('generated_at', { withTimezone: true }).notNull(),
    package: jsonb('package').$type<ApplicationPackage>().notNull(),
    createdAt: timestamp('created_at').defaultNow().notNull(),
  },
  (table) => ({
    applicationPackagesGeneratedAtIdx: index('application_packages_generated_at_idx').on(table.generatedAt),
  }),
);

export type CompanyProfileRow = typeof companyProfiles.$inferSelect;
export type JobAnalysisRow = typeof jobAnalyses.$inferSelect;
export type ApplicationPackageRow = typeof applicationPackages.$inferSelect;
