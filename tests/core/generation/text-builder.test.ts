import { describe, it, expect } from 'vitest';
import { buildText } from '../../../src/core/generation/text-builder.js';
import { buildRectangle } from '../../../src/core/generation/rectangle-builder.js';
import { addBoundElement } from '../../../src/core/generation/element-factory.js';
import { createNode, createTestContext } from '../../helpers/gliffy-fixtures.js';
import type { FlatNode } from '../../../src/core/types.js';

function textNode(id: string, html: string, overrides: Partial<FlatNode> = {}): FlatNode {
  return createNode({ id, detectedType: 'text', graphic: { type: 'Text', Text: { html } }, ...overrides });
}

describe('buildText', () => {
  it('should skip text with no visible content', () => {
    const node = textNode('1', '<p> </p>');

    expect(buildText(node, createTestContext([node]))).toEqual({ ok: false, reason: 'EmptyText' });
  });

  describe('arrow labels', () => {
    it('should center the label on the middle point of the arrow', () => {
      const arrow = createNode({ id: '10', detectedType: 'arrow' });
      const label = textNode('11', '<p>yes</p>', { parentId: '10' });
      const context = createTestContext([arrow, label]);
      context.arrowGeometry.set('10', { points: [[0, 0], [100, 0], [200, 0]], startArrow: 0, endArrow: 1 });

      const result = buildText(label, context);
      if (!result.ok) throw new Error('expected a label');

      expect(result.element).toMatchObject({
        text: 'yes',
        fontSize: 12,
        x: 75,
        y: -9,
        width: 50,
        height: 18,
        containerId: null,
        strokeColor: '#000000',
      });
    });

    it('should cap the label font size at 12', () => {
      const arrow = createNode({ id: '10', detectedType: 'arrow' });
      const label = textNode('11', '<span style="font-size: 18px">no</span>', { parentId: '10' });
      const context = createTestContext([arrow, label]);
      context.arrowGeometry.set('10', { points: [[0, 0], [10, 0]], startArrow: 0, endArrow: 1 });

      const result = buildText(label, context);
      if (!result.ok) throw new Error('expected a label');

      expect(result.element.fontSize).toBe(12);
    });

    it('should keep its own position when the arrow has no geometry', () => {
      const arrow = createNode({ id: '10', detectedType: 'arrow' });
      const label = textNode('11', 'maybe', { parentId: '10', x: 5, y: 6 });

      const result = buildText(label, createTestContext([arrow, label]));
      if (!result.ok) throw new Error('expected a label');

      expect(result.element.x).toBe(5);
      expect(result.element.y).toBe(6);
    });
  });

  it('should bind text whose parent was built as a shape', () => {
    const shapeNode = createNode({ id: '1', width: 200, height: 100 });
    const context = createTestContext([shapeNode]);
    const shape = buildRectangle(shapeNode, context);
    if (!shape.ok) throw new Error('expected a rectangle');
    context.idMap.set('1', shape.element.id);
    context.elementsById.set(shape.element.id, shape.element);

    const node = textNode('2', '<p><span style="font-size: 14px">Inside</span></p>', { parentId: '1' });
    const result = buildText(node, context);
    if (!result.ok) throw new Error('expected bound text');

    expect(result.element).toMatchObject({
      text: 'Inside',
      fontSize: 14,
      x: 10,
      y: 41.25,
      width: 180,
      height: 17.5,
      containerId: shape.element.id,
    });
    expect(shape.element.boundElements).toEqual([{ id: result.element.id, type: 'text' }]);
  });

  it('should leave text free when its container already holds a label', () => {
    const shapeNode = createNode({ id: '1', width: 200, height: 100 });
    const context = createTestContext([shapeNode]);
    const shape = buildRectangle(shapeNode, context);
    if (!shape.ok) throw new Error('expected a rectangle');
    context.idMap.set('1', shape.element.id);
    context.elementsById.set(shape.element.id, shape.element);
    addBoundElement(shape.element, { id: 'text_label', type: 'text' });

    const node = textNode('2', '<p>Extra</p>', { parentId: '1', x: 30, y: 40, width: 120, height: 30 });
    const result = buildText(node, context);
    if (!result.ok) throw new Error('expected text');

    expect(result.element).toMatchObject({ text: 'Extra', x: 30, y: 40, width: 120, height: 30, containerId: null });
    expect(shape.element.boundElements).toEqual([{ id: 'text_label', type: 'text' }]);
  });

  it('should place free text at its own geometry', () => {
    const node = textNode('1', '<p>Note</p>', { x: 30, y: 40, width: 120, height: 30, rotation: 180 });

    const result = buildText(node, createTestContext([node]));
    if (!result.ok) throw new Error('expected text');

    expect(result.element).toMatchObject({ x: 30, y: 40, width: 120, height: 30, fontSize: 20, containerId: null });
    expect(result.element.angle).toBeCloseTo(Math.PI);
  });

  it('should estimate the size of free text without geometry', () => {
    const node = textNode('1', '<p>Note</p>', { width: 0, height: 0 });

    const result = buildText(node, createTestContext([node]));
    if (!result.ok) throw new Error('expected text');

    expect(result.element.width).toBe(50);
    expect(result.element.height).toBe(25);
  });
});
