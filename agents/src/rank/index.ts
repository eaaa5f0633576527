/**
 * Rank - sub-scores, success prediction and overall rating
 *
 * - Skill Matcher: weighted requirement coverage and missing skills
 * - Culture Fit / Growth Potential scorers
 * - Success Predictor chain (optional language-model advisor)
 */

export * from './skill-synonyms.js';
export * from './skill-matcher.js';
export * from './culture-fit-scorer.js';
export * from './growth-potential-scorer.js';
export * from './advisor.js';
export * from './success-predictor.js';
export * from './scoring.js';
