/**
 * Styles module - stroke, fill and text resolvers
 */

export {
  DEFAULT_STROKE_COLOR,
  DEFAULT_STROKE_WIDTH,
  DEFAULT_SHAPE_FILL,
  normalizeColor,
  getStrokeColor,
  getFillColor,
  getStrokeWidth,
  getCornerRadius,
  mapArrowhead,
} from './extractor.js';

export {
  DEFAULT_SHAPE_FONT_SIZE,
  DEFAULT_LABEL_FONT_SIZE,
  DEFAULT_TEXT_COLOR,
  MAX_LABEL_FONT_SIZE,
  decodeEntities,
  htmlToText,
  getTextContent,
  getTextHtml,
  extractFontSize,
  labelFontSize,
} from './text.js';
