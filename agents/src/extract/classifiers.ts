/**
 * Salary, job type, industry and company size classification.
 * All tables are ordered; the first entry that qualifies wins.
 */

import type { CompanySize, Industry, JobType } from '@jobscope/schemas';
import { containsAnyTerm, countTerms } from '../shared/terms.js';

const SALARY_PATTERNS: readonly RegExp[] = [
  /\$\s?\d[\d,]*(?:\.\d+)?[kK]?\s*(?:-|–|—|to)\s*\$\s?\d[\d,]*(?:\.\d+)?[kK]?/,
  /[£€]\s?\d[\d,]*(?:\.\d+)?[kK]?\s*(?:-|–|—|to)\s*[£€]\s?\d[\d,]*(?:\.\d+)?[kK]?/,
  /\d[\d,]*[kK]?\s*(?:-|–|—)\s*\d[\d,]*[kK]?\s*(?:USD|EUR|GBP|dollars)\b/i,
];

export function extractSalary(text: string): string | null {
  for (const pattern of SALARY_PATTERNS) {
    const match = pattern.exec(text);
    if (match) return match[0];
  }
  return null;
}

const REMOTE_TERMS = ['remote', '100% remote', 'fully remote', 'work from home'];
const HYBRID_TERMS = ['hybrid', 'flexible', 'some remote'];

export function classifyJobType(lowerText: string): JobType {
  if (!lowerText.trim()) return 'unknown';
  if (containsAnyTerm(lowerText, REMOTE_TERMS)) return 'remote';
  if (containsAnyTerm(lowerText, HYBRID_TERMS)) return 'hybrid';
  return 'onsite';
}

export const INDUSTRY_KEYWORDS: ReadonlyArray<readonly [Industry, readonly string[]]> = [
  ['technology', ['software', 'tech', 'saas', 'platform', 'api', 'cloud', 'machine learning']],
  ['finance', ['bank', 'financial', 'fintech', 'trading', 'investment']],
  ['healthcare', ['health', 'medical', 'hospital', 'pharmaceutical']],
  ['ecommerce', ['ecommerce', 'retail', 'marketplace', 'shopping']],
  ['enterprise', ['enterprise', 'b2b', 'corporate', 'business solutions']],
  ['startup', ['startup', 'early stage', 'seed', 'venture']],
  ['consulting', ['consulting', 'advisory', 'professional services']],
];

const INDUSTRY_MIN_HITS = 2;

export function classifyIndustry(description: string, company: string): Industry {
  const text = `${description} ${company}`.toLowerCase();
  for (const [industry, keywords] of INDUSTRY_KEYWORDS) {
    if (countTerms(text, keywords) >= INDUSTRY_MIN_HITS) return industry;
  }
  return 'technology';
}

const SIZE_INDICATORS: ReadonlyArray<readonly [CompanySize, readonly string[]]> = [
  ['startup', ['startup', 'early stage', '1-10 employees', '11-50 employees']],
  ['small', ['small', '51-200 employees', '201-500 employees']],
  ['medium', ['medium', '501-1000 employees', '1001-5000 employees']],
  ['large', ['large', '5001-10000 employees', 'enterprise', 'fortune']],
  ['very_large', ['10000+ employees', 'multinational', 'global']],
];

const CORPORATE_SUFFIXES = ['inc', 'corp', 'ltd', 'llc'];

export function classifyCompanySize(lowerText: string, company: string): CompanySize {
  for (const [size, indicators] of SIZE_INDICATORS) {
    if (containsAnyTerm(lowerText, indicators)) return size;
  }
  if (containsAnyTerm(company.toLowerCase(), CORPORATE_SUFFIXES)) return 'medium';
  return 'unknown';
}
