/**
 * Rectangle builder
 */

import type { BuildResult, CompanionElement, ConversionContext, FlatNode, ShapeElement } from '../types.js';
import {
  DEFAULT_SHAPE_FILL,
  getCornerRadius,
  getFillColor,
  getStrokeColor,
  getStrokeWidth,
} from '../styles/extractor.js';
import { createBaseFields } from './element-factory.js';
import { buildBoundLabel, findShapeLabel } from './shape-label.js';

/** Size given to shapes whose source size is zero or negative */
export const MIN_SHAPE_SIZE = 100;

export function floorSize(value: number): number {
  return value <= 0 ? MIN_SHAPE_SIZE : value;
}

export function degreesToRadians(degrees: number): number {
  return (degrees * Math.PI) / 180;
}

/**
 * Attach the node's label (if any) to a built shape
 *
 * The label takes the higher of the shape's and the text child's z-order so
 * it is never drawn underneath its container.
 */
export function withLabel(
  element: ShapeElement,
  node: FlatNode,
  context: ConversionContext
): BuildResult<ShapeElement> {
  const label = findShapeLabel(node, context);
  if (!label) {
    return { ok: true, element };
  }

  const companion: CompanionElement = {
    element: buildBoundLabel(element, label, context),
    source: label.child,
    order: Math.max(node.order, label.source.order),
  };
  return { ok: true, element, companions: [companion] };
}

export function buildRectangle(node: FlatNode, context: ConversionContext): BuildResult<ShapeElement> {
  const radius = getCornerRadius(node);

  const element: ShapeElement = {
    ...createBaseFields(context.factory, 'rect'),
    type: 'rectangle',
    x: node.x,
    y: node.y,
    width: floorSize(node.width),
    height: floorSize(node.height),
    angle: degreesToRadians(node.rotation),
    strokeColor: getStrokeColor(node),
    backgroundColor: getFillColor(node, DEFAULT_SHAPE_FILL),
    strokeWidth: getStrokeWidth(node),
    roundness: radius === null ? null : { type: 3, value: radius },
  };

  return withLabel(element, node, context);
}

/**
 * Last-resort rendering of a node whose regular builder failed
 *
 * `withText: false` drops the label, for when the label itself is what fails.
 */
export function buildEmergencyRectangle(
  node: FlatNode,
  context: ConversionContext,
  withText = true
): BuildResult<ShapeElement> {
  const element: ShapeElement = {
    ...createBaseFields(context.factory, 'rect'),
    type: 'rectangle',
    x: Number.isFinite(node.x) ? node.x : 0,
    y: Number.isFinite(node.y) ? node.y : 0,
    width: floorSize(node.width),
    height: floorSize(node.height),
    strokeColor: '#000000',
    backgroundColor: DEFAULT_SHAPE_FILL,
  };

  return withText ? withLabel(element, node, context) : { ok: true, element };
}
