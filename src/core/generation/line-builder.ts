/**
 * Line builder - lines and arrows with endpoint bindings
 */

import type { ConstraintRef } from '../../api/types.js';
import type {
  BuildResult,
  ConversionContext,
  FlatNode,
  LinearElement,
  Point,
  PointBinding,
} from '../types.js';
import { getStrokeColor, getStrokeWidth, mapArrowhead } from '../styles/extractor.js';
import { resolveArrowGeometry } from '../layout/constraint-mapper.js';
import { createBaseFields } from './element-factory.js';

const BINDING_FOCUS = 0.5;
const BINDING_GAP = 0;

/**
 * Binding to the element built for a constraint's target, if there is one
 */
function resolveBinding(
  constraint: ConstraintRef | undefined,
  context: ConversionContext
): PointBinding | null {
  if (!constraint) return null;
  const elementId = context.idMap.get(constraint.nodeId);
  if (elementId === undefined) return null;

  const target = context.elementsById.get(elementId);
  if (!target || target.type === 'line' || target.type === 'arrow') return null;

  return { elementId, focus: BINDING_FOCUS, gap: BINDING_GAP };
}

/**
 * Points relative to the first one
 */
export function toRelativePoints(points: readonly Point[]): Point[] {
  const [originX, originY] = points[0];
  return points.map(([x, y]): Point => [x - originX, y - originY]);
}

function extent(points: readonly Point[]): { width: number; height: number } {
  let [minX, minY] = points[0];
  let [maxX, maxY] = points[0];
  for (const [x, y] of points) {
    minX = Math.min(minX, x);
    minY = Math.min(minY, y);
    maxX = Math.max(maxX, x);
    maxY = Math.max(maxY, y);
  }
  return { width: maxX - minX, height: maxY - minY };
}

/**
 * Build a line or arrow element
 *
 * Reuses the geometry indexed before the text pass when present.
 */
export function buildLine(node: FlatNode, context: ConversionContext): BuildResult<LinearElement> {
  const indexed = node.id === undefined ? undefined : context.arrowGeometry.get(node.id);
  const geometry = indexed ?? resolveArrowGeometry(node, context.objectInfo);
  if (typeof geometry === 'string') {
    return { ok: false, reason: geometry };
  }

  const points = toRelativePoints(geometry.points);
  const size = extent(points);
  const [x, y] = geometry.points[0];
  const isPlainLine = geometry.startArrow === 0 && geometry.endArrow === 0;

  const element: LinearElement = {
    ...createBaseFields(context.factory, isPlainLine ? 'line' : 'arrow'),
    type: isPlainLine ? 'line' : 'arrow',
    x,
    y,
    width: size.width,
    height: size.height,
    strokeColor: getStrokeColor(node),
    strokeWidth: getStrokeWidth(node),
    roundness: { type: 2 },
    points,
    lastCommittedPoint: points[points.length - 1],
    startBinding: resolveBinding(node.constraints?.start, context),
    endBinding: resolveBinding(node.constraints?.end, context),
    startArrowhead: mapArrowhead(geometry.startArrow),
    endArrowhead: mapArrowhead(geometry.endArrow),
  };

  return { ok: true, element };
}
