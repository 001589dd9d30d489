/**
 * Internal type definitions for the Gliffy source layer
 * These are clean, normalized types produced from raw .gliffy JSON
 */

/**
 * Point in diagram space: [x, y]
 */
export type Point = [number, number];

/**
 * Bounding box dimensions
 */
export interface BoundingBox {
  x: number;
  y: number;
  width: number;
  height: number;
}

/**
 * Shape payload (graphic.Shape)
 */
export interface ShapePayload {
  /** Stencil type id, e.g. com.gliffy.stencil.rectangle.basic_v1 */
  tid?: string;
  fillColor?: string;
  strokeColor?: string;
  strokeWidth?: number;
  cornerRadius?: number;
}

/**
 * Text payload (graphic.Text)
 */
export interface TextPayload {
  /** Rich text as Gliffy stores it (inline-styled HTML) */
  html?: string;
}

/**
 * Line payload (graphic.Line)
 */
export interface LinePayload {
  /** Polyline relative to the owning object's position */
  controlPath?: Point[];
  startArrow?: number;
  endArrow?: number;
  strokeColor?: string;
  strokeWidth?: number;
}

/**
 * Graphic kind, taken from graphic.type or inferred from the payload it carries
 */
export type GraphicKind = 'Shape' | 'Text' | 'Line' | 'Unknown';

interface GraphicPayloads {
  Shape?: ShapePayload;
  Text?: TextPayload;
  Line?: LinePayload;
}

export interface ShapeGraphic extends GraphicPayloads {
  type: 'Shape';
  Shape: ShapePayload;
}

export interface TextGraphic extends GraphicPayloads {
  type: 'Text';
  Text: TextPayload;
}

export interface LineGraphic extends GraphicPayloads {
  type: 'Line';
  Line: LinePayload;
}

/**
 * Graphic tagged with a kind we don't convert specially (Image, Svg, ...)
 */
export interface UnknownGraphic extends GraphicPayloads {
  type: 'Unknown';
  /** Original graphic.type value, if any */
  rawType?: string;
}

/**
 * Graphic descriptor - discriminated on `type`
 */
export type GliffyGraphic = ShapeGraphic | TextGraphic | LineGraphic | UnknownGraphic;

/**
 * Line endpoint attachment: node id + fractional position on its bounding box
 */
export interface ConstraintRef {
  nodeId: string;
  /** Fraction of the target width (0 = left, 1 = right) */
  px: number;
  /** Fraction of the target height (0 = top, 1 = bottom) */
  py: number;
}

export interface GliffyConstraints {
  start?: ConstraintRef;
  end?: ConstraintRef;
}

/**
 * Normalized Gliffy object (a node of the diagram tree)
 *
 * Coordinates are local to the parent object.
 */
export interface GliffyObject {
  /** Gliffy ids are numeric in files; always stored as strings here */
  id?: string;
  x: number;
  y: number;
  width: number;
  height: number;
  rotation: number;
  /** Z-index (smaller = further back) */
  order?: number;
  uid?: string;
  /** Explicit type tag (rare, but takes priority in classification) */
  type?: string;
  hidden: boolean;
  /** Plain text set directly on the object */
  text?: string;
  strokeColor?: string;
  fillColor?: string;
  strokeWidth?: number;
  graphic?: GliffyGraphic;
  constraints?: GliffyConstraints;
  /** Free polyline points, local to the parent */
  points?: Point[];
  children: GliffyObject[];
}

/**
 * Normalized Gliffy document
 */
export interface GliffyDiagram {
  /** Which layout the file used */
  layout: 'stage' | 'pages';
  /** One object list per page (a single entry for stage documents) */
  scenes: GliffyObject[][];
}
