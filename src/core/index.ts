/**
 * Core module - entry point
 * Converts Gliffy diagrams into Excalidraw documents
 */

// Main pipeline
export {
  convertGliffyToExcalidraw,
  convertWithReport,
  createContext,
  runPasses,
  buildShapePass,
  indexArrowGeometry,
  buildTextPass,
  buildArrowPass,
  PASS_ORDER,
  stages,
} from './pipeline.js';

// Types
export type {
  // Flattened tree
  DetectedType,
  FlatNode,

  // Excalidraw elements
  ExcalidrawElementType,
  ExcalidrawElement,
  ElementBase,
  ShapeElement,
  TextElement,
  LinearElement,
  ImageElement,
  BoundElement,
  PointBinding,
  Roundness,
  Arrowhead,

  // Document
  ExcalidrawDocument,
  ExcalidrawAppState,
  BinaryFileData,

  // Builders & pipeline
  BuildResult,
  SkipReason,
  SkippedNode,
  CompanionElement,
  ArrowGeometry,
  ImageResolver,
  ConvertOptions,
  ConversionContext,
  ConversionResult,
  ConversionStats,
  ElementFactory,
  EmittedElement,

  // Re-exported from API
  BoundingBox,
  GliffyObject,
  Point,
} from './types.js';

// Utilities
export { flattenObjects, flattenScenes, normalizeOrder } from './normalize/index.js';
export { classifyNode } from './recognize/index.js';
export { createEmptyDocument, computeViewport, DEFAULT_SOURCE } from './finalize/index.js';
export { transformDocument } from '../api/transformers.js';
