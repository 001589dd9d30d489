/**
 * Flatten module - turns the nested Gliffy object tree into a flat,
 * pre-ordered list of nodes in document-absolute coordinates
 */

import type { GliffyObject, Point } from '../../api/types.js';
import type { FlatNode } from '../types.js';
import { classifyNode } from '../recognize/classifier.js';

/**
 * Normalize a z-index: missing → 0, negative → 0, fractional → truncated
 */
export function normalizeOrder(order: number | undefined): number {
  if (order === undefined || !Number.isFinite(order)) return 0;
  return Math.max(0, Math.trunc(order));
}

function translatePoints(points: Point[] | undefined, dx: number, dy: number): Point[] | undefined {
  return points?.map(([x, y]): Point => [x + dx, y + dy]);
}

/**
 * Flatten a list of objects depth-first (parent before children)
 *
 * Absolute position = local position + inherited offset. Rotation is kept on
 * the node but not applied to the children's frame. The input tree is not mutated.
 *
 * @param objects - Objects local to the given offset
 * @param offsetX - Absolute x of the parent
 * @param offsetY - Absolute y of the parent
 * @param parentId - Source id of the parent
 */
export function flattenObjects(
  objects: readonly GliffyObject[],
  offsetX = 0,
  offsetY = 0,
  parentId?: string
): FlatNode[] {
  const result: FlatNode[] = [];

  function walk(list: readonly GliffyObject[], dx: number, dy: number, parent?: string): void {
    for (const object of list) {
      const { children, order, ...fields } = object;
      const x = object.x + dx;
      const y = object.y + dy;

      result.push({
        ...fields,
        x,
        y,
        points: translatePoints(object.points, dx, dy),
        detectedType: classifyNode(object),
        order: normalizeOrder(order),
        parentId: parent,
        index: result.length,
      });

      if (children.length > 0) {
        // Only objects with an id can be referenced as a parent
        walk(children, x, y, object.id);
      }
    }
  }

  walk(objects, offsetX, offsetY, parentId);
  return result;
}

/**
 * Flatten every scene of a document into one list
 *
 * Discovery indices run across scenes so tie-breaks stay stable.
 */
export function flattenScenes(scenes: readonly GliffyObject[][]): FlatNode[] {
  const nodes: FlatNode[] = [];
  for (const scene of scenes) {
    for (const node of flattenObjects(scene)) {
      nodes.push({ ...node, index: nodes.length });
    }
  }
  return nodes;
}
