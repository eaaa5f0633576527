/**
 * Text rendering and whitespace normalization shared by the extractors.
 */

import { HTMLElement, TextNode, type Node } from 'node-html-parser';

// Never rendered as text.
const SKIP_TAGS = new Set([
  'script',
  'style',
  'noscript',
  'template',
  'svg',
  'head',
  'iframe',
  'button',
  'form',
  'select',
  'textarea',
]);

const BLOCK_TAGS = new Set([
  'address',
  'article',
  'aside',
  'blockquote',
  'dd',
  'div',
  'dl',
  'dt',
  'footer',
  'h1',
  'h2',
  'h3',
  'h4',
  'h5',
  'h6',
  'header',
  'hr',
  'main',
  'nav',
  'ol',
  'p',
  'pre',
  'section',
  'table',
  'tr',
  'ul',
]);

/**
 * Text of an element with block boundaries kept as line breaks and list items
 * prefixed with a bullet, so section and bullet parsing work on markup the same
 * way they work on plain text.
 */
export function renderText(el: HTMLElement): string {
  const parts: string[] = [];
  walk(el, parts);
  return normalizeWhitespace(parts.join(''));
}

function walk(node: Node, parts: string[]): void {
  if (node instanceof TextNode) {
    // Source line breaks are not rendered; only block boundaries are.
    parts.push(node.text.replace(/[ \t\r\n\f]+/g, ' '));
    return;
  }
  if (!(node instanceof HTMLElement)) return;

  const tag = (node.rawTagName ?? '').toLowerCase();
  if (SKIP_TAGS.has(tag)) return;

  if (tag === 'br') {
    parts.push('\n');
    return;
  }
  if (tag === 'li') {
    parts.push('\n• ');
    for (const child of node.childNodes) walk(child, parts);
    return;
  }

  const block = BLOCK_TAGS.has(tag);
  if (block) parts.push('\n');
  for (const child of node.childNodes) walk(child, parts);
  if (block) parts.push('\n');
}

/** Collapse a fragment to a single line. */
export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

export function normalizeWhitespace(text: string): string {
  return text
    .replace(/\r\n?/g, '\n')
    .replace(/\u00a0/g, ' ')
    .split('\n')
    .map((line) => line.replace(/[ \t\f\v]+/g, ' ').trim())
    .join('\n')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}
