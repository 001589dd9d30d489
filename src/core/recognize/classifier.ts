/**
 * Type classifier - infers the semantic kind of a Gliffy object
 *
 * Resolution order (first match wins):
 * 1. explicit `type` field
 * 2. `uid` naming convention
 * 3. graphic descriptor (and the Shape tid)
 * 4. null - callers render these as rectangles
 *
 * Aspect ratio is never used here; circle refinement happens in the ellipse builder.
 */

import type { GliffyObject } from '../../api/types.js';
import type { DetectedType } from '../types.js';

type Classifiable = Pick<GliffyObject, 'type' | 'uid' | 'graphic'>;

const UID_PATTERNS: Array<{ type: DetectedType; markers: string[] }> = [
  { type: 'text', markers: ['.text'] },
  { type: 'rectangle', markers: ['.rectangle', '.square'] },
  { type: 'ellipse', markers: ['.ellipse', '.oval', '.circle', '.diamond'] },
  { type: 'arrow', markers: ['.arrow', '.line'] },
];

const ELLIPSE_TID_MARKERS = ['ellipse', 'oval', 'circle', 'diamond'];

/**
 * Classify from the uid naming convention
 */
export function classifyByUid(uid: string | undefined): DetectedType | null {
  if (!uid) return null;
  const lower = uid.toLowerCase();

  for (const { type, markers } of UID_PATTERNS) {
    if (markers.some(marker => lower.includes(marker))) {
      return type;
    }
  }
  return null;
}

/**
 * Classify from the graphic descriptor
 */
export function classifyByGraphic(graphic: GliffyObject['graphic']): DetectedType | null {
  if (!graphic) return null;

  switch (graphic.type) {
    case 'Text':
      return 'text';
    case 'Line':
      return 'arrow';
    case 'Shape': {
      // Diamonds belong to the ellipse family; the builder tells them apart by uid
      const tid = graphic.Shape.tid?.toLowerCase() ?? '';
      return ELLIPSE_TID_MARKERS.some(marker => tid.includes(marker)) ? 'ellipse' : 'rectangle';
    }
    case 'Unknown':
      return null;
  }
}

/**
 * Narrow an explicit type tag to the kinds the builders know about
 */
export function toDetectedType(kind: string): DetectedType | null {
  switch (kind) {
    case 'text':
    case 'rectangle':
    case 'ellipse':
    case 'arrow':
      return kind;
    default:
      return null;
  }
}

/**
 * Detect the logical type of a Gliffy object
 *
 * An explicit type tag always wins, even an unknown one ("image", "svg"):
 * those come back as null and are rendered as rectangles.
 */
export function classifyNode(node: Classifiable): DetectedType | null {
  if (node.type) {
    return toDetectedType(node.type.toLowerCase());
  }
  return classifyByUid(node.uid) ?? classifyByGraphic(node.graphic);
}

export function isText(node: Classifiable): boolean {
  return classifyNode(node) === 'text';
}

export function isArrow(node: Classifiable): boolean {
  return classifyNode(node) === 'arrow';
}
