/**
 * Unit tests for the classifier module
 */

import { describe, it, expect } from 'vitest';
import { classifyNode, classifyByUid, classifyByGraphic } from '../../../src/core/recognize/classifier.js';

describe('classifyByUid', () => {
  it('should match naming conventions', () => {
    expect(classifyByUid('com.gliffy.shape.basic.basic_v1.default.text')).toBe('text');
    expect(classifyByUid('com.gliffy.shape.basic.basic_v1.default.square')).toBe('rectangle');
    expect(classifyByUid('com.gliffy.shape.flowchart.flowchart_v1.default.diamond')).toBe('ellipse');
    expect(classifyByUid('com.gliffy.shape.basic.basic_v1.default.line')).toBe('arrow');
    expect(classifyByUid('com.gliffy.shape.network.server')).toBeNull();
    expect(classifyByUid(undefined)).toBeNull();
  });
});

describe('classifyByGraphic', () => {
  it('should map graphic kinds', () => {
    expect(classifyByGraphic({ type: 'Text', Text: {} })).toBe('text');
    expect(classifyByGraphic({ type: 'Line', Line: {} })).toBe('arrow');
    expect(classifyByGraphic({ type: 'Unknown' })).toBeNull();
  });

  it('should inspect the shape tid', () => {
    expect(classifyByGraphic({ type: 'Shape', Shape: { tid: 'com.gliffy.stencil.Circle.basic' } })).toBe('ellipse');
    expect(classifyByGraphic({ type: 'Shape', Shape: { tid: 'com.gliffy.stencil.diamond.basic' } })).toBe('ellipse');
    expect(classifyByGraphic({ type: 'Shape', Shape: { tid: 'com.gliffy.stencil.server' } })).toBe('rectangle');
    expect(classifyByGraphic({ type: 'Shape', Shape: {} })).toBe('rectangle');
  });
});

describe('classifyNode', () => {
  it('should prefer an explicit type over uid and graphic', () => {
    expect(
      classifyNode({ type: 'Text', uid: 'x.rectangle', graphic: { type: 'Line', Line: {} } })
    ).toBe('text');
  });

  it('should return null for an unknown explicit type', () => {
    expect(classifyNode({ type: 'svg', graphic: { type: 'Shape', Shape: {} } })).toBeNull();
  });

  it('should prefer uid over graphic', () => {
    expect(classifyNode({ uid: 'a.b.ellipse', graphic: { type: 'Shape', Shape: { tid: 'rect' } } })).toBe('ellipse');
  });

  it('should fall back to the graphic, then null', () => {
    expect(classifyNode({ graphic: { type: 'Line', Line: {} } })).toBe('arrow');
    expect(classifyNode({})).toBeNull();
  });
});
