/**
 * Field rule tables for title, company, location and description.
 *
 * Each table is evaluated top to bottom and the first non-empty pick wins.
 * Rules never throw: a selector the parser rejects is skipped and logged.
 */

import type { HTMLElement } from 'node-html-parser';
import { agentLog } from '../shared/agent-logs.js';
import type { PostingDocument } from './document.js';
import { collapseWhitespace, normalizeWhitespace, renderText } from './text.js';

export interface FieldRule {
  name: string;
  pick(doc: PostingDocument): string | null;
}

function selectOne(doc: PostingDocument, selector: string): HTMLElement | null {
  if (!doc.root) return null;
  try {
    return doc.root.querySelector(selector);
  } catch (err) {
    agentLog('FieldExtractor', `Selector skipped: ${selector}`, {
      level: 'debug',
      detail: err instanceof Error ? err.message : String(err),
    });
    return null;
  }
}

function nonEmpty(value: string | null | undefined): string | null {
  return value && value.trim() ? value : null;
}

/** Single-line text of the first element matching `selector`. */
function selectorRule(selector: string): FieldRule {
  return {
    name: selector,
    pick: (doc) => nonEmpty(collapseWhitespace(selectOne(doc, selector)?.text ?? '')),
  };
}

/** Multi-line text of a content region. */
function regionRule(selector: string): FieldRule {
  return {
    name: selector,
    pick: (doc) => {
      const el = selectOne(doc, selector);
      return el ? nonEmpty(renderText(el)) : null;
    },
  };
}

function metaRule(property: string): FieldRule {
  return {
    name: `meta[${property}]`,
    pick: (doc) => {
      const content = selectOne(doc, `meta[property="${property}"]`)?.getAttribute('content');
      return nonEmpty(collapseWhitespace(content ?? ''));
    },
  };
}

/** `Label: value` on a line of its own, e.g. `Company: Acme Robotics`. */
function labelRule(labels: readonly string[]): FieldRule {
  const pattern = new RegExp(`^(?:${labels.join('|')})[ \\t]*:[ \\t]*(.+)$`, 'im');
  return {
    name: `label:${labels[0]}`,
    pick: (doc) => nonEmpty(collapseWhitespace(pattern.exec(doc.text)?.[1] ?? '')),
  };
}

function jsonLdRule(field: 'title' | 'company' | 'location'): FieldRule {
  return {
    name: `json-ld:${field}`,
    pick: (doc) => nonEmpty(collapseWhitespace(doc.jsonLd?.[field] ?? '')),
  };
}

export const TITLE_RULES: readonly FieldRule[] = [
  jsonLdRule('title'),
  selectorRule('h1[data-testid="jobTitle"]'),
  selectorRule('h1.jobsearch-JobInfoHeader-title'),
  selectorRule('h1.job-title'),
  selectorRule('h1[class*="job-title"]'),
  selectorRule('h1[class*="title"]'),
  selectorRule('.job-header h1'),
  selectorRule('h1'),
  metaRule('og:title'),
  labelRule(['job title', 'title', 'position', 'role']),
];

export const COMPANY_RULES: readonly FieldRule[] = [
  jsonLdRule('company'),
  selectorRule('[data-testid="companyName"]'),
  selectorRule('.jobsearch-InlineCompanyRating a'),
  selectorRule('.company-name'),
  selectorRule('[class*="company"] a'),
  selectorRule('[class*="company-name"]'),
  metaRule('og:site_name'),
  labelRule(['company', 'employer', 'organization']),
];

export const LOCATION_RULES: readonly FieldRule[] = [
  jsonLdRule('location'),
  selectorRule('[data-testid="jobLocation"]'),
  selectorRule('.jobsearch-InlineCompanyRating + div'),
  selectorRule('[class*="location"]'),
  labelRule(['location', 'based in']),
];

export const DESCRIPTION_RULES: readonly FieldRule[] = [
  {
    name: 'json-ld:description',
    pick: (doc) => nonEmpty(normalizeWhitespace(doc.jsonLd?.description ?? '')),
  },
  regionRule('[data-testid="jobDescription"]'),
  regionRule('.jobsearch-jobDescriptionText'),
  regionRule('#jobDescriptionText'),
  regionRule('.job-description'),
  regionRule('[class*="description"]'),
  regionRule('article'),
  { name: 'document', pick: (doc) => nonEmpty(doc.text) },
];

export function firstMatch(rules: readonly FieldRule[], doc: PostingDocument): string | null {
  for (const rule of rules) {
    const value = rule.pick(doc);
    if (value !== null) return value;
  }
  return null;
}
