/**
 * @jobscope/db - PostgreSQL stores (drizzle-orm over pg)
 */

export * from './schema';
export * from './client';
export * from './company-profiles';
export * from './job-analyses';
export * from './application-packages';
