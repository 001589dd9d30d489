/**
 * Unit tests for stroke/fill/width resolution
 */

import { describe, it, expect } from 'vitest';
import {
  normalizeColor,
  getStrokeColor,
  getFillColor,
  getStrokeWidth,
  getCornerRadius,
  mapArrowhead,
} from '../../../src/core/styles/extractor.js';

describe('normalizeColor', () => {
  it('should normalize CSS colors to lower-case hex', () => {
    expect(normalizeColor('#FF0000')).toBe('#ff0000');
    expect(normalizeColor('red')).toBe('#ff0000');
    expect(normalizeColor('rgb(0,128,255)')).toBe('#0080ff');
    expect(normalizeColor('not-a-color')).toBeNull();
  });
});

describe('getStrokeColor', () => {
  it('should prefer the node, then Line, then Shape', () => {
    expect(
      getStrokeColor({
        strokeColor: '#111111',
        graphic: { type: 'Line', Line: { strokeColor: '#222222' }, Shape: { strokeColor: '#333333' } },
      })
    ).toBe('#111111');
    expect(
      getStrokeColor({ graphic: { type: 'Line', Line: { strokeColor: '#222222' }, Shape: { strokeColor: '#333333' } } })
    ).toBe('#222222');
    expect(getStrokeColor({ graphic: { type: 'Shape', Shape: { strokeColor: '#333333' } } })).toBe('#333333');
  });

  it('should default to #1e1e1e or the given fallback', () => {
    expect(getStrokeColor({})).toBe('#1e1e1e');
    expect(getStrokeColor({}, '#000000')).toBe('#000000');
    expect(getStrokeColor({ strokeColor: '   ' })).toBe('#1e1e1e');
  });

  it('should keep "none" as transparent and drop invalid colors', () => {
    expect(getStrokeColor({ strokeColor: 'none' })).toBe('transparent');
    expect(getStrokeColor({ strokeColor: 'bogus' })).toBe('#1e1e1e');
  });
});

describe('getFillColor', () => {
  it('should prefer the node over Shape', () => {
    expect(getFillColor({ fillColor: '#ABCDEF', graphic: { type: 'Shape', Shape: { fillColor: '#000000' } } })).toBe('#abcdef');
    expect(getFillColor({ graphic: { type: 'Shape', Shape: { fillColor: '#000000' } } })).toBe('#000000');
  });

  it('should map empty fills to the caller default', () => {
    expect(getFillColor({ fillColor: 'none' }, '#f9f9f9')).toBe('#f9f9f9');
    expect(getFillColor({ fillColor: 'transparent' })).toBe('transparent');
    expect(getFillColor({ fillColor: '' }, '#f9f9f9')).toBe('#f9f9f9');
    expect(getFillColor({}, '#f9f9f9')).toBe('#f9f9f9');
  });
});

describe('getStrokeWidth', () => {
  it('should prefer the node, then Line, then Shape, then 2', () => {
    expect(getStrokeWidth({ strokeWidth: 4, graphic: { type: 'Line', Line: { strokeWidth: 3 } } })).toBe(4);
    expect(getStrokeWidth({ graphic: { type: 'Line', Line: { strokeWidth: 3 } } })).toBe(3);
    expect(getStrokeWidth({ graphic: { type: 'Shape', Shape: { strokeWidth: 1 } } })).toBe(1);
    expect(getStrokeWidth({})).toBe(2);
  });
});

describe('getCornerRadius', () => {
  it('should only return positive radii', () => {
    expect(getCornerRadius({ graphic: { type: 'Shape', Shape: { cornerRadius: 8 } } })).toBe(8);
    expect(getCornerRadius({ graphic: { type: 'Shape', Shape: { cornerRadius: 0 } } })).toBeNull();
    expect(getCornerRadius({})).toBeNull();
  });
});

describe('mapArrowhead', () => {
  it('should map 0 and cardinality codes to no arrowhead', () => {
    expect(mapArrowhead(0)).toBeNull();
    expect(mapArrowhead(10)).toBeNull();
    expect(mapArrowhead(11)).toBeNull();
    expect(mapArrowhead(12)).toBeNull();
    expect(mapArrowhead(undefined)).toBeNull();
  });

  it('should map every other code to an arrow', () => {
    expect(mapArrowhead(1)).toBe('arrow');
    expect(mapArrowhead(2)).toBe('arrow');
    expect(mapArrowhead(17)).toBe('arrow');
  });
});
