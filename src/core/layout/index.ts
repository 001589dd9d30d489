/**
 * Layout module - endpoint resolution and text layout approximation
 */

export {
  resolveConstraintPoint,
  resolveLinePoints,
  resolveArrowGeometry,
  arrowCode,
  polylineMidpoint,
} from './constraint-mapper.js';

export {
  CONTAINER_TEXT_MARGIN,
  maxCharsPerLine,
  wrapText,
  inShapeFontSize,
  estimateLabelSize,
  textBaseline,
} from './text-layout.js';
