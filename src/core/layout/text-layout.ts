/**
 * Text layout approximation - greedy wrapping and label sizing
 *
 * Widths are estimated from character counts (average glyph ≈ 0.6 × font size);
 * no font metrics are available.
 */

const AVERAGE_CHAR_WIDTH_RATIO = 0.6;
const MIN_CHAR_WIDTH = 3;

/** Horizontal margin kept free inside a container shape */
export const CONTAINER_TEXT_MARGIN = 20;

const IN_SHAPE_SCALE = 0.5;
const IN_SHAPE_MIN_FONT_SIZE = 8;
const IN_SHAPE_MAX_FONT_SIZE = 10;

const LABEL_MIN_WIDTH = 50;
const LABEL_MAX_WIDTH = 200;

/**
 * How many characters fit on a line of the given width
 */
export function maxCharsPerLine(maxWidth: number, fontSize: number): number {
  const charWidth = Math.max(MIN_CHAR_WIDTH, fontSize * AVERAGE_CHAR_WIDTH_RATIO);
  return Math.floor(maxWidth / charWidth);
}

function splitLongWord(word: string, maxChars: number): string[] {
  const chunks: string[] = [];
  for (let offset = 0; offset < word.length; offset += maxChars) {
    chunks.push(word.slice(offset, offset + maxChars));
  }
  return chunks;
}

/**
 * Greedy word wrap
 *
 * Words accumulate while the line stays within the budget; a word longer than
 * the budget is hard-split into budget-sized pieces. Existing line breaks are kept.
 */
export function wrapText(text: string, maxWidth: number, fontSize: number): string {
  if (!text || maxWidth <= 0 || fontSize <= 0) {
    return text;
  }

  const maxChars = maxCharsPerLine(maxWidth, fontSize);
  if (maxChars < 1) {
    return text;
  }

  const lines: string[] = [];
  for (const rawLine of text.split('\n')) {
    const line = rawLine.trim();
    if (line.length <= maxChars) {
      lines.push(line);
      continue;
    }

    let current = '';
    for (const word of line.split(/\s+/)) {
      const candidate = current ? `${current} ${word}` : word;
      if (candidate.length <= maxChars) {
        current = candidate;
      } else if (current) {
        lines.push(current);
        current = word.length <= maxChars ? word : '';
        if (!current) lines.push(...splitLongWord(word, maxChars));
      } else {
        lines.push(...splitLongWord(word, maxChars));
      }
    }
    if (current) {
      lines.push(current);
    }
  }

  return lines.join('\n');
}

/**
 * Font size of text embedded in a shape: halved, clamped to [8, 10]
 */
export function inShapeFontSize(extracted: number): number {
  const scaled = Math.trunc(extracted * IN_SHAPE_SCALE);
  return Math.min(IN_SHAPE_MAX_FONT_SIZE, Math.max(IN_SHAPE_MIN_FONT_SIZE, scaled));
}

/**
 * Estimated box of a floating arrow label
 */
export function estimateLabelSize(text: string, fontSize: number): { width: number; height: number } {
  const charCount = text.replace(/\n/g, ' ').length;
  const lineCount = text.split('\n').length;
  const estimatedWidth = charCount * fontSize * AVERAGE_CHAR_WIDTH_RATIO;

  return {
    width: Math.min(Math.max(estimatedWidth, LABEL_MIN_WIDTH), LABEL_MAX_WIDTH),
    height: Math.max(fontSize * 1.5, fontSize * lineCount * 1.2),
  };
}

/**
 * Baseline offset Excalidraw expects for single-line text
 */
export function textBaseline(fontSize: number): number {
  return Math.trunc(fontSize * 0.85);
}
