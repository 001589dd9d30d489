import { describe, it, expect } from 'vitest';
import { buildLine, toRelativePoints } from '../../../src/core/generation/line-builder.js';
import { buildRectangle } from '../../../src/core/generation/rectangle-builder.js';
import { createNode, createTestContext } from '../../helpers/gliffy-fixtures.js';
import type { ConversionContext, FlatNode } from '../../../src/core/types.js';

const shapeA = createNode({ id: '1', x: 0, y: 0, width: 100, height: 100 });
const shapeB = createNode({ id: '2', x: 200, y: 0, width: 100, height: 100 });

function arrowNode(overrides: Partial<FlatNode> = {}): FlatNode {
  return createNode({
    id: '3',
    detectedType: 'arrow',
    graphic: { type: 'Line', Line: { startArrow: 0, endArrow: 1, strokeColor: '#FF0000' } },
    constraints: {
      start: { nodeId: '1', px: 1, py: 0.5 },
      end: { nodeId: '2', px: 0, py: 0.5 },
    },
    ...overrides,
  });
}

function registerShape(node: FlatNode, context: ConversionContext): string {
  const result = buildRectangle(node, context);
  if (!result.ok) throw new Error('expected a rectangle');
  context.idMap.set(node.id ?? '', result.element.id);
  context.elementsById.set(result.element.id, result.element);
  return result.element.id;
}

describe('toRelativePoints', () => {
  it('should subtract the first point', () => {
    expect(toRelativePoints([[10, 20], [30, 20], [30, 60]])).toEqual([[0, 0], [20, 0], [20, 40]]);
  });
});

describe('buildLine', () => {
  it('should size polylines with very many points', () => {
    const controlPath = Array.from({ length: 200_000 }, (_, i): [number, number] => [i, i % 7]);
    const line = arrowNode({
      constraints: undefined,
      graphic: { type: 'Line', Line: { startArrow: 0, endArrow: 0, controlPath } },
    });

    const result = buildLine(line, createTestContext([line]));
    if (!result.ok) throw new Error('expected a line');

    expect(result.element.width).toBe(199_999);
    expect(result.element.height).toBe(6);
  });

  it('should build an arrow from resolved constraints', () => {
    const arrow = arrowNode();

    const result = buildLine(arrow, createTestContext([shapeA, shapeB, arrow]));
    if (!result.ok) throw new Error('expected an arrow');

    expect(result.element).toMatchObject({
      type: 'arrow',
      x: 100,
      y: 50,
      width: 100,
      height: 0,
      points: [[0, 0], [100, 0]],
      lastCommittedPoint: [100, 0],
      startArrowhead: null,
      endArrowhead: 'arrow',
      strokeColor: '#ff0000',
      roundness: { type: 2 },
      startBinding: null,
      endBinding: null,
    });
    expect(result.element.id.startsWith('arrow_')).toBe(true);
  });

  it('should bind both ends to built shapes', () => {
    const arrow = arrowNode();
    const context = createTestContext([shapeA, shapeB, arrow]);
    const idA = registerShape(shapeA, context);
    const idB = registerShape(shapeB, context);

    const result = buildLine(arrow, context);
    if (!result.ok) throw new Error('expected an arrow');

    expect(result.element.startBinding).toEqual({ elementId: idA, focus: 0.5, gap: 0 });
    expect(result.element.endBinding).toEqual({ elementId: idB, focus: 0.5, gap: 0 });
  });

  it('should emit a plain line when neither end has an arrowhead', () => {
    const line = arrowNode({
      graphic: { type: 'Line', Line: { startArrow: 0, endArrow: 0 } },
    });

    const result = buildLine(line, createTestContext([shapeA, shapeB, line]));
    if (!result.ok) throw new Error('expected a line');

    expect(result.element.type).toBe('line');
    expect(result.element.id.startsWith('line_')).toBe(true);
    expect(result.element.endArrowhead).toBeNull();
  });

  it('should prefer the control path, offset by the line position', () => {
    const line = arrowNode({
      x: 10,
      y: 10,
      graphic: { type: 'Line', Line: { controlPath: [[0, 0], [50, 0], [50, 40]], startArrow: 2, endArrow: 11 } },
    });

    const result = buildLine(line, createTestContext([shapeA, shapeB, line]));
    if (!result.ok) throw new Error('expected an arrow');

    expect(result.element).toMatchObject({
      x: 10,
      y: 10,
      width: 50,
      height: 40,
      points: [[0, 0], [50, 0], [50, 40]],
      startArrowhead: 'arrow',
      endArrowhead: null,
    });
  });

  it('should reuse indexed geometry', () => {
    const arrow = arrowNode();
    const context = createTestContext([shapeA, shapeB, arrow]);
    context.arrowGeometry.set('3', { points: [[5, 5], [5, 25]], startArrow: 0, endArrow: 0 });

    const result = buildLine(arrow, context);
    if (!result.ok) throw new Error('expected a line');

    expect(result.element.type).toBe('line');
    expect(result.element.points).toEqual([[0, 0], [0, 20]]);
  });

  it('should report unresolvable constraints as dangling', () => {
    const arrow = arrowNode({
      constraints: { start: { nodeId: '98', px: 0, py: 0 }, end: { nodeId: '99', px: 0, py: 0 } },
    });

    expect(buildLine(arrow, createTestContext([arrow]))).toEqual({ ok: false, reason: 'DanglingReference' });
  });

  it('should not bind to another line', () => {
    const other = arrowNode({ id: '4' });
    const arrow = arrowNode({
      id: '5',
      constraints: { start: { nodeId: '1', px: 1, py: 0.5 }, end: { nodeId: '4', px: 0, py: 0 } },
    });
    const context = createTestContext([shapeA, shapeB, other, arrow]);
    const first = buildLine(other, context);
    if (!first.ok) throw new Error('expected an arrow');
    context.idMap.set('4', first.element.id);
    context.elementsById.set(first.element.id, first.element);

    const result = buildLine(arrow, context);
    if (!result.ok) throw new Error('expected an arrow');

    expect(result.element.endBinding).toBeNull();
  });
});
