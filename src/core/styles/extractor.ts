/**
 * Styles extractor - stroke/fill/width resolution for Gliffy objects
 *
 * Each resolver has a fixed precedence: object-level value first, then the
 * nested Line payload, then the nested Shape payload, then a default.
 */

import chroma from 'chroma-js';
import type { GliffyObject } from '../../api/types.js';
import type { Arrowhead } from '../types.js';

type StyledObject = Pick<GliffyObject, 'strokeColor' | 'fillColor' | 'strokeWidth' | 'graphic'>;

export const DEFAULT_STROKE_COLOR = '#1e1e1e';
export const DEFAULT_STROKE_WIDTH = 2;
export const DEFAULT_SHAPE_FILL = '#f9f9f9';

/**
 * Fill values meaning "no fill"
 */
const EMPTY_FILL_VALUES = new Set(['none', 'transparent', '']);

/**
 * Arrow codes for ERD cardinality markers (crow's foot, double bar, ...)
 * Excalidraw has no equivalent, so they render without an arrowhead
 */
const CARDINALITY_ARROW_CODES = new Set([10, 11, 12]);

function firstNonEmpty(...values: Array<string | undefined>): string | undefined {
  return values.find(value => value !== undefined && value.trim() !== '');
}

/**
 * Normalize any CSS color to lower-case hex (#rrggbb, #rrggbbaa with alpha)
 *
 * @returns null when chroma cannot parse the value
 */
export function normalizeColor(value: string): string | null {
  const trimmed = value.trim();
  if (!chroma.valid(trimmed)) {
    return null;
  }
  return chroma(trimmed).hex();
}

/**
 * Stroke color: object → Line → Shape → default
 */
export function getStrokeColor(node: StyledObject, fallback = DEFAULT_STROKE_COLOR): string {
  const raw = firstNonEmpty(
    node.strokeColor,
    node.graphic?.Line?.strokeColor,
    node.graphic?.Shape?.strokeColor
  );
  if (raw === undefined) {
    return fallback;
  }
  if (EMPTY_FILL_VALUES.has(raw.trim().toLowerCase())) {
    return 'transparent';
  }
  return normalizeColor(raw) ?? fallback;
}

/**
 * Fill color: object → Shape; "none"/"transparent"/empty → the caller's default
 */
export function getFillColor(node: StyledObject, fallback = 'transparent'): string {
  const candidates = [node.fillColor, node.graphic?.Shape?.fillColor];

  for (const candidate of candidates) {
    if (candidate === undefined) continue;
    if (EMPTY_FILL_VALUES.has(candidate.trim().toLowerCase())) {
      return fallback;
    }
    return normalizeColor(candidate) ?? fallback;
  }

  return fallback;
}

/**
 * Stroke width: object → Line → Shape → default
 */
export function getStrokeWidth(node: StyledObject, fallback = DEFAULT_STROKE_WIDTH): number {
  return (
    node.strokeWidth ??
    node.graphic?.Line?.strokeWidth ??
    node.graphic?.Shape?.strokeWidth ??
    fallback
  );
}

/**
 * Positive corner radius of a shape, if any
 */
export function getCornerRadius(node: Pick<GliffyObject, 'graphic'>): number | null {
  const radius = node.graphic?.Shape?.cornerRadius;
  return radius !== undefined && radius > 0 ? radius : null;
}

/**
 * Map a Gliffy arrow code to an Excalidraw arrowhead
 *
 * 0 = none; 10-12 = ERD cardinality (unsupported) → none;
 * every other code (simple, open, filled...) → a generic arrow.
 */
export function mapArrowhead(code: number | undefined): Arrowhead | null {
  if (code === undefined || !Number.isFinite(code)) return null;
  const value = Math.trunc(code);
  if (value === 0 || CARDINALITY_ARROW_CODES.has(value)) {
    return null;
  }
  return 'arrow';
}
