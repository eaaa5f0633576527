/**
 * Requirement and preferred-qualification extraction.
 *
 * Section headers are searched case-insensitively; a section runs until the
 * next blank line or the next line that starts with a capital letter, judged
 * on the original-case text. Items are lowercased before they are kept.
 */

export const MAX_REQUIREMENTS = 10;
export const MAX_PREFERRED = 8;
export const MIN_ITEM_LENGTH = 10;
export const MAX_ITEM_LENGTH = 200;

const REQUIREMENT_HEADERS: readonly RegExp[] = [
  /\brequirements?:?\s*/gi,
  /(?<!preferred )\bqualifications?:?\s*/gi,
  /\bmust have:?\s*/gi,
  /\brequired skills?:?\s*/gi,
];

const PREFERRED_HEADERS: readonly RegExp[] = [
  /\bpreferred(?:[ \t]+(?:qualifications?|skills?|experience))?:?\s*/gi,
  /\bnice to have:?\s*/gi,
  /\bbonus:?\s*/gi,
  /\bplus:\s*/gi,
];

// Case-sensitive on purpose: the boundary is a capitalized line.
const SECTION_BODY = /^[\s\S]*?(?=\n\n|\n[A-Z]|$)/;

const ITEM_DELIMITERS = /[•\n\-*]/;

// Phrase patterns run over lowercase text and never cross a line break.
const PHRASE_PATTERNS: readonly RegExp[] = [
  /\d+\+?[ \t]*years?[ \t]*(?:of[ \t]*)?experience[ \t]*(?:with\b[ \t]*)?[\w \t,]+/g,
  /\bbachelor'?s?(?:[ \t]*degree)?(?:[ \t]+in[ \t]+[\w \t]+)?/g,
  /\bmaster'?s?(?:[ \t]*degree)?(?:[ \t]+in[ \t]+[\w \t]+)?/g,
  /\bexperience[ \t]*(?:with|in)\b[ \t]*[\w \t,]+/g,
  /\bproficient[ \t]*(?:with|in)\b[ \t]*[\w \t,]+/g,
  /\bknowledge[ \t]*of\b[ \t]*[\w \t,]+/g,
];

function keepItem(item: string): boolean {
  return item.length >= MIN_ITEM_LENGTH && item.length < MAX_ITEM_LENGTH;
}

/** Bodies of every section introduced by one of `headers`, in header-table order. */
export function captureSections(text: string, headers: readonly RegExp[]): string[] {
  const bodies: string[] = [];
  for (const header of headers) {
    header.lastIndex = 0;
    let match: RegExpExecArray | null;
    while ((match = header.exec(text)) !== null) {
      const start = match.index + match[0].length;
      const body = SECTION_BODY.exec(text.slice(start));
      if (body && body[0]) bodies.push(body[0]);
      if (match[0].length === 0) header.lastIndex++;
    }
  }
  return bodies;
}

export function splitItems(section: string): string[] {
  return section
    .split(ITEM_DELIMITERS)
    .map((item) => item.trim().toLowerCase())
    .filter(keepItem);
}

export function findPhraseRequirements(lowerText: string): string[] {
  const found: string[] = [];
  for (const pattern of PHRASE_PATTERNS) {
    for (const match of lowerText.matchAll(pattern)) {
      const phrase = match[0].replace(/[\s,]+$/, '').trim();
      if (keepItem(phrase)) found.push(phrase);
    }
  }
  return found;
}

/** First-seen order, exact match after trim. */
export function dedupe(items: readonly string[], limit: number): string[] {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const raw of items) {
    const item = raw.trim();
    if (seen.has(item)) continue;
    seen.add(item);
    out.push(item);
    if (out.length === limit) break;
  }
  return out;
}

/**
 * @param displayText whitespace-normalized description in original case
 */
export function extractRequirements(displayText: string): string[] {
  const sectionItems = captureSections(displayText, REQUIREMENT_HEADERS).flatMap(splitItems);
  const phraseItems = findPhraseRequirements(displayText.toLowerCase());
  return dedupe([...sectionItems, ...phraseItems], MAX_REQUIREMENTS);
}

export function extractPreferredQualifications(displayText: string): string[] {
  return dedupe(captureSections(displayText, PREFERRED_HEADERS).flatMap(splitItems), MAX_PREFERRED);
}
