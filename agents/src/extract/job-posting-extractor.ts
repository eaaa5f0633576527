/**
 * Field Extractor - raw posting markup or text to a fully populated JobPosting
 *
 * Responsibilities:
 * - Title, company, location and description via ordered rule tables
 * - Requirement and preferred-qualification sections plus phrase patterns
 * - Salary, job type, industry and company size classification
 *
 * LLM Usage: None. Never throws; missing fields fall back to named defaults.
 */

import type { JobPosting } from '@jobscope/schemas';
import { agentLog } from '../shared/agent-logs.js';
import { loadPostingDocument, type PostingDocument } from './document.js';
import { normalizeWhitespace } from './text.js';
import {
  COMPANY_RULES,
  DESCRIPTION_RULES,
  LOCATION_RULES,
  TITLE_RULES,
  firstMatch,
} from './field-rules.js';
import { extractPreferredQualifications, extractRequirements } from './requirements.js';
import {
  classifyCompanySize,
  classifyIndustry,
  classifyJobType,
  extractSalary,
} from './classifiers.js';

export const DEFAULT_TITLE = 'Job Position';
export const DEFAULT_COMPANY = 'Company';
export const DEFAULT_LOCATION = 'Location not specified';
export const PLACEHOLDER_DESCRIPTION = 'Job description could not be retrieved';

function readDocument(raw: string): PostingDocument {
  try {
    return loadPostingDocument(raw);
  } catch (err) {
    agentLog('FieldExtractor', 'Markup could not be parsed, reading it as text', {
      level: 'warn',
      detail: err instanceof Error ? err.message : String(err),
    });
    return { kind: 'text', root: null, text: normalizeWhitespace(raw), jsonLd: null };
  }
}

export function extractJobPosting(rawDocument: string): JobPosting {
  const doc = readDocument(rawDocument);

  const title = firstMatch(TITLE_RULES, doc) ?? DEFAULT_TITLE;
  const company = firstMatch(COMPANY_RULES, doc) ?? DEFAULT_COMPANY;
  const location = firstMatch(LOCATION_RULES, doc) ?? DEFAULT_LOCATION;
  const displayDescription = firstMatch(DESCRIPTION_RULES, doc) ?? '';
  const description = displayDescription.toLowerCase();
  const lowerText = doc.text.toLowerCase();

  const posting: JobPosting = {
    title,
    company,
    location,
    description,
    displayDescription,
    salaryRange: extractSalary(doc.text),
    jobType: classifyJobType(lowerText),
    requirements: extractRequirements(displayDescription),
    preferredQualifications: extractPreferredQualifications(displayDescription),
    industry: classifyIndustry(description, company),
    companySize: classifyCompanySize(lowerText, company),
  };

  agentLog('FieldExtractor', `Extracted "${title}" at ${company}`, {
    level: 'debug',
    detail: `${posting.requirements.length} requirements, ${posting.preferredQualifications.length} preferred`,
  });
  return posting;
}

/** Stand-in posting used when the document could not be fetched. */
export function createPlaceholderPosting(): JobPosting {
  return {
    title: DEFAULT_TITLE,
    company: DEFAULT_COMPANY,
    location: DEFAULT_LOCATION,
    description: PLACEHOLDER_DESCRIPTION.toLowerCase(),
    displayDescription: PLACEHOLDER_DESCRIPTION,
    salaryRange: null,
    jobType: 'unknown',
    requirements: [],
    preferredQualifications: [],
    industry: 'technology',
    companySize: 'unknown',
  };
}
