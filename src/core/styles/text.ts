/**
 * Text extraction - plain text and font size from Gliffy rich text
 */

import type { GliffyObject } from '../../api/types.js';

export const DEFAULT_SHAPE_FONT_SIZE = 20;
export const DEFAULT_LABEL_FONT_SIZE = 12;
export const DEFAULT_TEXT_COLOR = '#000000';
/** Arrow labels never exceed this size, so they stay subordinate to shape text */
export const MAX_LABEL_FONT_SIZE = 12;

type TextSource = Pick<GliffyObject, 'text' | 'graphic'>;

const FONT_SIZE_PATTERN = /font-size:\s*(\d+(?:\.\d+)?)\s*px/i;

/** Tags that start a new line of text */
const BLOCK_TAG_PATTERN = /<\s*(br|\/?p|\/?div|\/?li|\/?h[1-6]|\/?tr|\/?ul|\/?ol)\b[^>]*>/gi;
const ANY_TAG_PATTERN = /<[^>]*>/g;

const MAX_CODE_POINT = 0x10ffff;

const NAMED_ENTITIES: Record<string, string> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
  nbsp: ' ',
};

function fromCodePoint(code: number, match: string): string {
  return Number.isNaN(code) || code > MAX_CODE_POINT ? match : String.fromCodePoint(code);
}

/**
 * Decode named and numeric HTML entities
 *
 * Numeric entities outside the Unicode range are kept as written.
 */
export function decodeEntities(text: string): string {
  return text.replace(/&(#x[0-9a-f]+|#\d+|[a-z]+);/gi, (match, entity: string) => {
    if (entity.startsWith('#x') || entity.startsWith('#X')) {
      return fromCodePoint(parseInt(entity.slice(2), 16), match);
    }
    if (entity.startsWith('#')) {
      return fromCodePoint(parseInt(entity.slice(1), 10), match);
    }
    return NAMED_ENTITIES[entity.toLowerCase()] ?? match;
  });
}

/**
 * Strip markup: block tags become line breaks, whitespace inside a line
 * collapses, empty lines are dropped
 */
export function htmlToText(html: string): string {
  const withBreaks = html.replace(BLOCK_TAG_PATTERN, '\n').replace(ANY_TAG_PATTERN, '');
  return decodeEntities(withBreaks)
    .split('\n')
    .map(line => line.replace(/\s+/g, ' ').trim())
    .filter(line => line.length > 0)
    .join('\n');
}

/**
 * Readable text of an object: direct `text` field, else the stripped Text html
 */
export function getTextContent(node: TextSource): string {
  if (node.text) {
    return node.text;
  }
  const html = node.graphic?.Text?.html;
  return html ? htmlToText(html) : '';
}

export function getTextHtml(node: TextSource): string | undefined {
  return node.graphic?.Text?.html;
}

/**
 * First `font-size: Npx` anywhere in the html, truncated to an integer
 */
export function extractFontSize(html: string | undefined, fallback: number): number {
  if (!html) return fallback;
  const match = FONT_SIZE_PATTERN.exec(html);
  if (!match) return fallback;
  const size = Math.trunc(parseFloat(match[1]));
  return size > 0 ? size : fallback;
}

/**
 * Font size for a floating arrow label: extracted size capped at 12
 */
export function labelFontSize(html: string | undefined): number {
  return Math.min(extractFontSize(html, DEFAULT_LABEL_FONT_SIZE), MAX_LABEL_FONT_SIZE);
}
