/**
 * Ellipse builder - ellipses, circles and diamonds
 */

import type { BuildResult, ConversionContext, FlatNode, ShapeElement } from '../types.js';
import { DEFAULT_SHAPE_FILL, getFillColor, getStrokeColor, getStrokeWidth } from '../styles/extractor.js';
import { createBaseFields } from './element-factory.js';
import { degreesToRadians, floorSize, withLabel } from './rectangle-builder.js';

const CIRCLE_RATIO = 0.9;
const DIAMOND_UID_MARKERS = ['diamond', 'decision'];

/**
 * Near-square boxes become perfect circles
 */
export function normalizeCircle(width: number, height: number): { width: number; height: number } {
  const ratio = Math.min(width, height) / Math.max(width, height);
  if (ratio > CIRCLE_RATIO) {
    const size = (width + height) / 2;
    return { width: size, height: size };
  }
  return { width, height };
}

export function isDiamond(node: Pick<FlatNode, 'uid'>): boolean {
  const uid = node.uid?.toLowerCase() ?? '';
  return DIAMOND_UID_MARKERS.some(marker => uid.includes(marker));
}

export function buildEllipse(node: FlatNode, context: ConversionContext): BuildResult<ShapeElement> {
  const size = normalizeCircle(floorSize(node.width), floorSize(node.height));

  const element: ShapeElement = {
    ...createBaseFields(context.factory, 'ellipse'),
    // Checked after circle normalization: diamonds keep their box
    type: isDiamond(node) ? 'diamond' : 'ellipse',
    x: node.x,
    y: node.y,
    width: size.width,
    height: size.height,
    angle: degreesToRadians(node.rotation),
    strokeColor: getStrokeColor(node),
    backgroundColor: getFillColor(node, DEFAULT_SHAPE_FILL),
    strokeWidth: getStrokeWidth(node),
    roundness: { type: 2 },
  };

  return withLabel(element, node, context);
}
