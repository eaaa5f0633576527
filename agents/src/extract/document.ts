/**
 * Posting document model: raw markup or plain text, parsed once and shared by
 * every extraction rule.
 */

import { parse, type HTMLElement } from 'node-html-parser';
import { readJsonLdPosting, type JsonLdPosting } from './json-ld.js';
import { normalizeWhitespace, renderText } from './text.js';

export interface PostingDocument {
  kind: 'html' | 'text';
  /** Parsed tree for markup input; null for plain text. */
  root: HTMLElement | null;
  /** Whole-document text, whitespace-normalized, original case. */
  text: string;
  jsonLd: JsonLdPosting | null;
}

// Markup must open the document; a tag named inside plain prose does not count.
const MARKUP_START =
  /^\uFEFF?\s*(?:<!--|<\?xml\b|<!doctype\b|<(?:html|head|body|div|p|h[1-6]|ul|ol|li|span|section|article|main|header|script|meta|table|a)\b[^>]*>)/i;

export function looksLikeHtml(raw: string): boolean {
  return MARKUP_START.test(raw);
}

export function loadPostingDocument(raw: string): PostingDocument {
  if (!looksLikeHtml(raw)) {
    return { kind: 'text', root: null, text: normalizeWhitespace(raw), jsonLd: null };
  }

  const root = parse(raw, {
    comment: false,
    blockTextElements: {
      script: true,
      noscript: false,
      style: false,
      pre: true,
    },
  });

  const body = root.querySelector('body') ?? root;
  return {
    kind: 'html',
    root,
    text: renderText(body),
    jsonLd: readJsonLdPosting(root),
  };
}
