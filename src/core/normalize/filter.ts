/**
 * Filter module - hidden nodes never reach the builders
 */

import type { BoundingBox } from '../../api/types.js';
import type { FlatNode } from '../types.js';

export function isHidden(node: FlatNode): boolean {
  return node.hidden;
}

/**
 * Visible nodes, in discovery order
 */
export function visibleNodes(nodes: readonly FlatNode[]): FlatNode[] {
  return nodes.filter(node => !isHidden(node));
}

/**
 * Index nodes by source id (first occurrence wins)
 */
export function indexNodes(nodes: readonly FlatNode[]): Map<string, FlatNode> {
  const byId = new Map<string, FlatNode>();
  for (const node of nodes) {
    if (node.id !== undefined && !byId.has(node.id)) {
      byId.set(node.id, node);
    }
  }
  return byId;
}

/**
 * Absolute bounding boxes keyed by source id, used to resolve constraints
 *
 * Hidden nodes are included: a visible line may still attach to them.
 */
export function buildObjectInfo(nodes: readonly FlatNode[]): Map<string, BoundingBox> {
  const info = new Map<string, BoundingBox>();
  for (const node of nodes) {
    if (node.id === undefined) continue;
    info.set(node.id, { x: node.x, y: node.y, width: node.width, height: node.height });
  }
  return info;
}
