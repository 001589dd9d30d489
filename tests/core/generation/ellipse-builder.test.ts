import { describe, it, expect } from 'vitest';
import { buildEllipse, normalizeCircle, isDiamond } from '../../../src/core/generation/ellipse-builder.js';
import { createNode, createTestContext } from '../../helpers/gliffy-fixtures.js';

describe('normalizeCircle', () => {
  it('should square boxes with a ratio above 0.9', () => {
    expect(normalizeCircle(100, 96)).toEqual({ width: 98, height: 98 });
  });

  it('should keep clearly oval boxes', () => {
    expect(normalizeCircle(100, 90)).toEqual({ width: 100, height: 90 });
    expect(normalizeCircle(200, 100)).toEqual({ width: 200, height: 100 });
  });
});

describe('isDiamond', () => {
  it('should match diamond and decision uids', () => {
    expect(isDiamond({ uid: 'com.gliffy.shape.flowchart.flowchart_v1.default.decision' })).toBe(true);
    expect(isDiamond({ uid: 'com.gliffy.shape.basic.basic_v1.default.Diamond' })).toBe(true);
    expect(isDiamond({ uid: 'com.gliffy.shape.basic.basic_v1.default.ellipse' })).toBe(false);
    expect(isDiamond({})).toBe(false);
  });
});

describe('buildEllipse', () => {
  it('should build a rounded ellipse with the default fill', () => {
    const node = createNode({ detectedType: 'ellipse', width: 200, height: 100 });

    const result = buildEllipse(node, createTestContext([node]));
    if (!result.ok) throw new Error('expected an ellipse');

    expect(result.element).toMatchObject({
      type: 'ellipse',
      width: 200,
      height: 100,
      roundness: { type: 2 },
      backgroundColor: '#f9f9f9',
    });
    expect(result.element.id.startsWith('ellipse_')).toBe(true);
  });

  it('should floor degenerate sizes before normalizing', () => {
    const node = createNode({ detectedType: 'ellipse', width: 0, height: 0 });

    const result = buildEllipse(node, createTestContext([node]));
    if (!result.ok) throw new Error('expected an ellipse');

    expect(result.element.width).toBe(100);
    expect(result.element.height).toBe(100);
  });

  it('should emit diamonds for decision uids', () => {
    const node = createNode({
      detectedType: 'ellipse',
      uid: 'com.gliffy.shape.flowchart.flowchart_v1.default.decision',
      width: 120,
      height: 80,
    });

    const result = buildEllipse(node, createTestContext([node]));
    if (!result.ok) throw new Error('expected a diamond');

    expect(result.element.type).toBe('diamond');
    expect(result.element.width).toBe(120);
  });

  it('should bind a label like rectangles do', () => {
    const shape = createNode({ id: '1', detectedType: 'ellipse', width: 100, height: 100 });
    const text = createNode({
      id: '2',
      parentId: '1',
      detectedType: 'text',
      graphic: { type: 'Text', Text: { html: '<p>Start</p>' } },
    });

    const result = buildEllipse(shape, createTestContext([shape, text]));
    if (!result.ok) throw new Error('expected an ellipse');

    const [companion] = result.companions ?? [];
    expect(companion.element).toMatchObject({ text: 'Start', fontSize: 10, width: 80, containerId: result.element.id });
  });
});
