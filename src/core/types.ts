/**
 * Core types for the Gliffy-to-Excalidraw transformation pipeline
 */

import type { BoundingBox, GliffyObject, Point } from '../api/types.js';

// Re-export commonly used source types
export type { BoundingBox, GliffyObject, Point };

// ============================================================================
// Flattened Tree Types
// ============================================================================

/**
 * Semantic kind detected for a node
 */
export type DetectedType = 'text' | 'rectangle' | 'ellipse' | 'arrow';

/**
 * Node after coordinate absolutization
 *
 * Same fields as the source object, but x/y (and points) are document-absolute
 * and children are replaced by the flat list order + parentId back-reference.
 */
export interface FlatNode extends Omit<GliffyObject, 'children' | 'order'> {
  /** Cached classification (null = unrecognized, rendered as rectangle) */
  detectedType: DetectedType | null;
  /** Non-negative z-index */
  order: number;
  /** Source id of the immediate parent, if any */
  parentId?: string;
  /** Discovery index in pre-order traversal */
  index: number;
}

// ============================================================================
// Excalidraw Element Types
// ============================================================================

export type ExcalidrawElementType =
  | 'rectangle'
  | 'ellipse'
  | 'diamond'
  | 'text'
  | 'line'
  | 'arrow'
  | 'image';

export type FillStyle = 'solid' | 'hachure' | 'cross-hatch';
export type StrokeStyle = 'solid' | 'dashed' | 'dotted';

/**
 * Corner rounding: type 2 = proportional, type 3 = adaptive radius
 */
export interface Roundness {
  type: 2 | 3;
  value?: number;
}

/**
 * Back-reference from a shape to text/arrows attached to it
 */
export interface BoundElement {
  id: string;
  type: 'text' | 'arrow';
}

export interface PointBinding {
  elementId: string;
  focus: number;
  gap: number;
}

export type Arrowhead = 'arrow';

export interface ElementBase {
  id: string;
  x: number;
  y: number;
  width: number;
  height: number;
  angle: number;
  strokeColor: string;
  backgroundColor: string;
  fillStyle: FillStyle;
  strokeWidth: number;
  strokeStyle: StrokeStyle;
  roughness: number;
  opacity: number;
  groupIds: string[];
  frameId: string | null;
  roundness: Roundness | null;
  boundElements: BoundElement[] | null;
  seed: number;
  version: number;
  versionNonce: number;
  updated: number;
  isDeleted: boolean;
  locked: boolean;
  link: string | null;
}

export interface ShapeElement extends ElementBase {
  type: 'rectangle' | 'ellipse' | 'diamond';
}

export interface TextElement extends ElementBase {
  type: 'text';
  text: string;
  originalText: string;
  fontSize: number;
  fontFamily: number;
  textAlign: 'left' | 'center' | 'right';
  verticalAlign: 'top' | 'middle' | 'bottom';
  containerId: string | null;
  baseline: number;
  lineHeight: number;
}

export interface LinearElement extends ElementBase {
  type: 'line' | 'arrow';
  /** Relative to (x, y); the first point is always [0, 0] */
  points: Point[];
  lastCommittedPoint: Point | null;
  startBinding: PointBinding | null;
  endBinding: PointBinding | null;
  startArrowhead: Arrowhead | null;
  endArrowhead: Arrowhead | null;
}

export interface ImageElement extends ElementBase {
  type: 'image';
  fileId: string;
  scale: [number, number];
  status: 'saved';
}

export type ExcalidrawElement = ShapeElement | TextElement | LinearElement | ImageElement;

/**
 * Entry of the document's external file map
 */
export interface BinaryFileData {
  id: string;
  mimeType: string;
  dataURL: string;
  created: number;
}

export interface ExcalidrawAppState {
  gridSize: null;
  viewBackgroundColor: string;
  scrollX?: number;
  scrollY?: number;
  zoom?: { value: number };
}

export interface ExcalidrawDocument {
  type: 'excalidraw';
  version: 2;
  source: string;
  elements: ExcalidrawElement[];
  appState: ExcalidrawAppState;
  files: Record<string, BinaryFileData>;
}

// ============================================================================
// Builder Types
// ============================================================================

/**
 * Why a node produced no element
 */
export type SkipReason = 'EmptyText' | 'DanglingReference' | 'InvalidGeometry' | 'UnresolvedImage';

/**
 * Outcome of a builder: an element (plus companions, e.g. a bound label),
 * or the reason nothing was emitted
 */
export type BuildResult<T extends ExcalidrawElement = ExcalidrawElement> =
  | { ok: true; element: T; companions?: CompanionElement[]; file?: BinaryFileData }
  | { ok: false; reason: SkipReason };

/**
 * Extra element emitted alongside a built element
 */
export interface CompanionElement {
  element: ExcalidrawElement;
  /** Source node the companion stands for (a consumed text child) */
  source?: FlatNode;
  order: number;
}

/**
 * Recorded skip, surfaced in the conversion result
 */
export interface SkippedNode {
  sourceId?: string;
  detectedType: DetectedType | null;
  reason: SkipReason;
}

/**
 * Resolved polyline of an arrow node, indexed before texts are built
 */
export interface ArrowGeometry {
  /** Absolute points, in source order */
  points: Point[];
  startArrow: number;
  endArrow: number;
}

/**
 * TID → image lookup (consumed collaborator)
 *
 * Must never throw for unknown tids.
 */
export interface ImageResolver {
  shouldUseImage(tid: string): boolean;
  getImageBytes(tid: string): Uint8Array | null;
}

/**
 * Options for a conversion call
 */
export interface ConvertOptions {
  /** Value of the document's `source` field */
  source?: string;
  /** Clock for `updated`/`created` timestamps */
  now?: () => number;
  /** Random source in [0, 1) for seeds and nonces */
  random?: () => number;
}

/**
 * Element emitted by a pass, with its originating z-order
 */
export interface EmittedElement {
  element: ExcalidrawElement;
  order: number;
}

/**
 * Per-call conversion state threaded through every pass
 */
export interface ConversionContext {
  nodes: readonly FlatNode[];
  nodesById: ReadonlyMap<string, FlatNode>;
  /** Source id → absolute bounding box (hidden nodes included) */
  objectInfo: ReadonlyMap<string, BoundingBox>;
  /** Source id → emitted element id */
  idMap: Map<string, string>;
  /** Emitted element id → element (for back-references) */
  elementsById: Map<string, ExcalidrawElement>;
  emitted: EmittedElement[];
  arrowGeometry: Map<string, ArrowGeometry>;
  /** Discovery indices of text nodes already emitted as a shape's bound label */
  consumedTexts: Set<number>;
  files: Record<string, BinaryFileData>;
  skipped: SkippedNode[];
  resolver?: ImageResolver;
  factory: ElementFactory;
}

/**
 * Creates element ids and bookkeeping fields
 */
export interface ElementFactory {
  newId(prefix: string): string;
  randomInt(): number;
  now(): number;
}

/**
 * Counters reported with a conversion
 */
export interface ConversionStats {
  sourceNodes: number;
  hiddenNodes: number;
  elements: number;
  images: number;
  skipped: number;
}

/**
 * Conversion output with observability data
 */
export interface ConversionResult {
  document: ExcalidrawDocument;
  skipped: SkippedNode[];
  stats: ConversionStats;
}
