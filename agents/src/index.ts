/**
 * @jobscope/agents - Job analysis and scoring engine
 *
 * - extract/   : Posting markup or text to a JobPosting
 * - rank/      : Skill, culture, growth and success sub-scores
 * - match/     : Company profiling, cached by company name
 * - strategy/  : Application strategy, timing and follow-up
 * - planner/   : Per-posting pipeline and batch orchestration
 * - apply/     : Talking points and cover letter per analyzed posting
 * - profile/   : Candidate profile loading
 * - shared/    : Base agent, logging and term matching
 */

export * from './shared/index.js';
export * from './extract/index.js';
export * from './rank/index.js';
export * from './match/index.js';
export * from './strategy/index.js';
export * from './profile/index.js';
export * from './planner/index.js';
export * from './apply/index.js';
