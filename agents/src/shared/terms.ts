/**
 * Keyword matching shared by every vocabulary lookup: a term is present when
 * it occurs anywhere in the lowercased text. Vocabularies avoid short terms
 * that would fire inside unrelated words.
 */

/** `text` is expected to be lowercase already. */
export function containsTerm(text: string, term: string): boolean {
  return text.includes(term.toLowerCase());
}

export function containsAnyTerm(text: string, terms: readonly string[]): boolean {
  return terms.some((t) => containsTerm(text, t));
}

export function countTerms(text: string, terms: readonly string[]): number {
  return terms.reduce((n, t) => (containsTerm(text, t) ? n + 1 : n), 0);
}

/** Vocabulary entries present in text, in vocabulary order. */
export function findTerms(text: string, vocabulary: readonly string[]): string[] {
  return vocabulary.filter((t) => containsTerm(text, t));
}

/** Round to two decimals, the precision every score is reported at. */
export function roundScore(value: number): number {
  return Math.round(value * 100) / 100;
}

export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}
