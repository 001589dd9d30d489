/**
 * Recognize module - entry point
 * Classifies nodes into semantic types
 */

export {
  classifyNode,
  classifyByUid,
  classifyByGraphic,
  toDetectedType,
  isText,
  isArrow,
} from './classifier.js';
