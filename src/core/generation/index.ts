/**
 * Generation Layer - builds Excalidraw elements from flattened Gliffy nodes
 */

// Element construction
export {
  createElementFactory,
  createBaseFields,
  createTextElement,
  addBoundElement,
  isContainerElement,
  hasBoundText,
  textBlockHeight,
} from './element-factory.js';
export type { TextFields } from './element-factory.js';

// Builders
export {
  buildRectangle,
  buildEmergencyRectangle,
  floorSize,
  degreesToRadians,
  MIN_SHAPE_SIZE,
} from './rectangle-builder.js';
export { buildEllipse, normalizeCircle, isDiamond } from './ellipse-builder.js';
export { buildText } from './text-builder.js';
export { buildLine, toRelativePoints } from './line-builder.js';
export { buildImage, wantsImage, detectMimeType, toDataUrl, fileIdFor, getShapeTid } from './image-builder.js';
export type { ImageMimeType } from './image-builder.js';

// Labels
export { findShapeLabel, buildBoundLabel, isArrowLabel } from './shape-label.js';
export type { ShapeLabel } from './shape-label.js';
