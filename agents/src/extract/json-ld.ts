/**
 * schema.org JobPosting blocks embedded as JSON-LD. Most ATS pages ship one,
 * and it is the most reliable source for title, company and location.
 */

import { parse, type HTMLElement } from 'node-html-parser';
import { renderText } from './text.js';

export interface JsonLdPosting {
  title: string | null;
  company: string | null;
  location: string | null;
  /** Description markup converted to plain text. */
  description: string | null;
}

type JsonRecord = Record<string, unknown>;

function isRecord(value: unknown): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function asRecord(value: unknown): JsonRecord | null {
  return isRecord(value) ? value : null;
}

function asText(value: unknown): string | null {
  return typeof value === 'string' && value.trim() ? value.trim() : null;
}

function isJobPosting(item: JsonRecord): boolean {
  const t = item['@type'];
  return t === 'JobPosting' || (Array.isArray(t) && t.includes('JobPosting'));
}

function candidatesOf(data: unknown): JsonRecord[] {
  const items = Array.isArray(data) ? data : [data];
  const out: JsonRecord[] = [];
  for (const item of items) {
    const rec = asRecord(item);
    if (!rec) continue;
    out.push(rec);
    const graph = rec['@graph'];
    if (Array.isArray(graph)) {
      for (const g of graph) {
        const gr = asRecord(g);
        if (gr) out.push(gr);
      }
    }
  }
  return out;
}

function locationOf(value: unknown): string | null {
  const first = Array.isArray(value) ? value[0] : value;
  const place = asRecord(first);
  if (!place) return asText(first);
  const address = asRecord(place.address);
  if (address) {
    const parts = [address.addressLocality, address.addressRegion, address.addressCountry]
      .map(asText)
      .filter((p): p is string => p !== null);
    if (parts.length > 0) return parts.join(', ');
  }
  return asText(place.name);
}

function htmlToText(markup: string): string {
  return renderText(parse(`<div>${markup}</div>`));
}

export function readJsonLdPosting(root: HTMLElement): JsonLdPosting | null {
  for (const script of root.querySelectorAll('script[type="application/ld+json"]')) {
    let data: unknown;
    try {
      data = JSON.parse(script.rawText);
    } catch {
      continue; // malformed block; try the next one
    }

    const posting = candidatesOf(data).find(isJobPosting);
    if (!posting) continue;

    const description = asText(posting.description);
    return {
      title: asText(posting.title),
      company: asText(asRecord(posting.hiringOrganization)?.name),
      location: locationOf(posting.jobLocation),
      description: description ? htmlToText(description) : null,
    };
  }
  return null;
}
