/**
 * Unit tests for the filter module
 */

import { describe, it, expect } from 'vitest';
import { visibleNodes, indexNodes, buildObjectInfo } from '../../../src/core/normalize/filter.js';
import { createNode } from '../../helpers/gliffy-fixtures.js';

describe('visibleNodes', () => {
  it('should drop hidden nodes and keep order', () => {
    const nodes = [createNode({ id: 'a' }), createNode({ id: 'b', hidden: true }), createNode({ id: 'c' })];

    expect(visibleNodes(nodes).map(node => node.id)).toEqual(['a', 'c']);
  });
});

describe('indexNodes', () => {
  it('should keep the first node for a duplicated id and skip id-less nodes', () => {
    const first = createNode({ id: 'a', x: 1 });
    const byId = indexNodes([first, createNode({ id: 'a', x: 2 }), createNode({ id: undefined })]);

    expect(byId.size).toBe(1);
    expect(byId.get('a')).toBe(first);
  });
});

describe('buildObjectInfo', () => {
  it('should include hidden nodes', () => {
    const info = buildObjectInfo([createNode({ id: 'h', hidden: true, x: 5, y: 6, width: 7, height: 8 })]);

    expect(info.get('h')).toEqual({ x: 5, y: 6, width: 7, height: 8 });
  });
});
