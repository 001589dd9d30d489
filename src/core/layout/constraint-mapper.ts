/**
 * Constraint Mapper
 * Resolves Gliffy line endpoints (controlPath or constraints) to absolute points
 */

import type { BoundingBox, ConstraintRef, Point } from '../../api/types.js';
import type { ArrowGeometry, FlatNode, SkipReason } from '../types.js';

/**
 * Resolve a constraint to an absolute point on the target's bounding box
 *
 * @returns null when the target id was never indexed (dangling reference)
 */
export function resolveConstraintPoint(
  constraint: ConstraintRef | undefined,
  objectInfo: ReadonlyMap<string, BoundingBox>
): Point | null {
  if (!constraint) return null;

  const info = objectInfo.get(constraint.nodeId);
  if (!info) return null;

  return [info.x + info.width * constraint.px, info.y + info.height * constraint.py];
}

/**
 * controlPath points are local to the line object
 */
function controlPathPoints(node: FlatNode): Point[] {
  const path = node.graphic?.Line?.controlPath ?? [];
  return path.map(([px, py]): Point => [node.x + px, node.y + py]);
}

function constraintPoints(node: FlatNode, objectInfo: ReadonlyMap<string, BoundingBox>): Point[] {
  const points: Point[] = [];
  const start = resolveConstraintPoint(node.constraints?.start, objectInfo);
  const end = resolveConstraintPoint(node.constraints?.end, objectInfo);
  if (start) points.push(start);
  if (end) points.push(end);
  return points;
}

/**
 * Absolute polyline of a line object
 *
 * Sources, in order: Line.controlPath, start/end constraints, free `points`.
 * Point order is never reversed.
 */
export function resolveLinePoints(
  node: FlatNode,
  objectInfo: ReadonlyMap<string, BoundingBox>
): Point[] {
  const fromPath = controlPathPoints(node);
  if (fromPath.length > 0) return fromPath;

  const fromConstraints = constraintPoints(node, objectInfo);
  if (fromConstraints.length > 0) return fromConstraints;

  return node.points ?? [];
}

/**
 * Arrow code of one end; non-integer codes are truncated, missing → 0
 */
export function arrowCode(code: number | undefined): number {
  return code === undefined || !Number.isFinite(code) ? 0 : Math.trunc(code);
}

/**
 * Resolve the full geometry of an arrow node
 *
 * Fewer than two points means there is nothing to draw: a dangling reference
 * when the line relied on constraints, invalid geometry otherwise.
 */
export function resolveArrowGeometry(
  node: FlatNode,
  objectInfo: ReadonlyMap<string, BoundingBox>
): ArrowGeometry | SkipReason {
  const points = resolveLinePoints(node, objectInfo);

  if (points.length < 2) {
    const hasConstraints = node.constraints?.start !== undefined || node.constraints?.end !== undefined;
    return hasConstraints ? 'DanglingReference' : 'InvalidGeometry';
  }

  return {
    points,
    startArrow: arrowCode(node.graphic?.Line?.startArrow),
    endArrow: arrowCode(node.graphic?.Line?.endArrow),
  };
}

/**
 * Middle point of a polyline, by index (not by arc length)
 */
export function polylineMidpoint(points: readonly Point[]): Point | null {
  if (points.length === 0) return null;
  return points[Math.floor(points.length / 2)];
}
