/**
 * Raw .gliffy JSON → Internal type converters
 *
 * Parsing never throws: fields with an unexpected JSON type are treated as
 * absent, and entries that are not objects are skipped.
 */

import type {
  ConstraintRef,
  GliffyConstraints,
  GliffyDiagram,
  GliffyGraphic,
  GliffyObject,
  GraphicKind,
  LinePayload,
  Point,
  ShapePayload,
  TextPayload,
} from './types.js';

type RawRecord = Record<string, unknown>;

export function isRecord(value: unknown): value is RawRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Read a number from a number or a numeric string
 */
export function readNumber(value: unknown): number | undefined {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : undefined;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}

/**
 * Read a string; numbers are stringified (Gliffy ids and tids can be numeric)
 */
export function readString(value: unknown): string | undefined {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  return undefined;
}

function readBoolean(value: unknown): boolean {
  return value === true || value === 'true';
}

/**
 * Read an [x, y] pair; extra coordinates are ignored
 */
export function readPoint(value: unknown): Point | undefined {
  if (!Array.isArray(value) || value.length < 2) return undefined;
  const x = readNumber(value[0]);
  const y = readNumber(value[1]);
  if (x === undefined || y === undefined) return undefined;
  return [x, y];
}

function readPoints(value: unknown): Point[] | undefined {
  if (!Array.isArray(value)) return undefined;
  const points: Point[] = [];
  for (const entry of value) {
    const point = readPoint(entry);
    if (point) points.push(point);
  }
  return points;
}

export function transformShape(raw: unknown): ShapePayload | undefined {
  if (!isRecord(raw)) return undefined;
  return {
    tid: readString(raw.tid),
    fillColor: readString(raw.fillColor),
    strokeColor: readString(raw.strokeColor),
    strokeWidth: readNumber(raw.strokeWidth),
    cornerRadius: readNumber(raw.cornerRadius),
  };
}

export function transformText(raw: unknown): TextPayload | undefined {
  if (!isRecord(raw)) return undefined;
  return { html: readString(raw.html) };
}

export function transformLine(raw: unknown): LinePayload | undefined {
  if (!isRecord(raw)) return undefined;
  return {
    controlPath: readPoints(raw.controlPath),
    startArrow: readNumber(raw.startArrow),
    endArrow: readNumber(raw.endArrow),
    strokeColor: readString(raw.strokeColor),
    strokeWidth: readNumber(raw.strokeWidth),
  };
}

function graphicKind(rawType: string | undefined, payloads: {
  Shape?: ShapePayload;
  Text?: TextPayload;
  Line?: LinePayload;
}): GraphicKind {
  switch (rawType?.toLowerCase()) {
    case 'shape':
      return 'Shape';
    case 'text':
      return 'Text';
    case 'line':
      return 'Line';
    case undefined:
    case '':
      break;
    default:
      return 'Unknown';
  }

  // Untagged graphic: go by the payload it carries
  if (payloads.Text) return 'Text';
  if (payloads.Line) return 'Line';
  if (payloads.Shape) return 'Shape';
  return 'Unknown';
}

/**
 * Convert graphic descriptor to the discriminated GliffyGraphic union
 */
export function transformGraphic(raw: unknown): GliffyGraphic | undefined {
  if (!isRecord(raw)) return undefined;

  const rawType = readString(raw.type);
  const payloads = {
    Shape: transformShape(raw.Shape),
    Text: transformText(raw.Text),
    Line: transformLine(raw.Line),
  };

  const kind = graphicKind(rawType, payloads);
  switch (kind) {
    case 'Shape':
      return { ...payloads, type: 'Shape', Shape: payloads.Shape ?? {} };
    case 'Text':
      return { ...payloads, type: 'Text', Text: payloads.Text ?? {} };
    case 'Line':
      return { ...payloads, type: 'Line', Line: payloads.Line ?? {} };
    case 'Unknown':
      return { ...payloads, type: 'Unknown', rawType };
  }
}

function transformConstraintRef(raw: unknown): ConstraintRef | undefined {
  if (!isRecord(raw)) return undefined;
  const nodeId = readString(raw.nodeId);
  if (!nodeId) return undefined;
  return {
    nodeId,
    px: readNumber(raw.px) ?? 0.5,
    py: readNumber(raw.py) ?? 0.5,
  };
}

/**
 * Gliffy nests endpoints as
 * constraints.startConstraint.StartPositionConstraint / endConstraint.EndPositionConstraint
 */
export function transformConstraints(raw: unknown): GliffyConstraints | undefined {
  if (!isRecord(raw)) return undefined;

  const startWrapper = raw.startConstraint;
  const endWrapper = raw.endConstraint;
  const start = isRecord(startWrapper)
    ? transformConstraintRef(startWrapper.StartPositionConstraint)
    : undefined;
  const end = isRecord(endWrapper)
    ? transformConstraintRef(endWrapper.EndPositionConstraint)
    : undefined;

  if (!start && !end) return undefined;
  return { start, end };
}

/**
 * Convert a raw Gliffy object (recursively, including children)
 */
export function transformObject(raw: RawRecord): GliffyObject {
  const children = Array.isArray(raw.children) ? transformObjects(raw.children) : [];

  return {
    id: readString(raw.id),
    x: readNumber(raw.x) ?? 0,
    y: readNumber(raw.y) ?? 0,
    width: readNumber(raw.width) ?? 0,
    height: readNumber(raw.height) ?? 0,
    rotation: readNumber(raw.rotation) ?? 0,
    order: readNumber(raw.order),
    uid: readString(raw.uid),
    type: readString(raw.type),
    hidden: readBoolean(raw.hidden),
    text: readString(raw.text),
    strokeColor: readString(raw.strokeColor),
    fillColor: readString(raw.fillColor),
    strokeWidth: readNumber(raw.strokeWidth),
    graphic: transformGraphic(raw.graphic),
    constraints: transformConstraints(raw.constraints),
    points: readPoints(raw.points),
    children,
  };
}

export function transformObjects(raw: unknown[]): GliffyObject[] {
  const objects: GliffyObject[] = [];
  for (const entry of raw) {
    if (isRecord(entry)) {
      objects.push(transformObject(entry));
    }
  }
  return objects;
}

/**
 * Convert a raw .gliffy document
 *
 * @returns null when the input has neither `stage.objects` nor `pages[].scene.objects`
 */
export function transformDocument(raw: unknown): GliffyDiagram | null {
  if (!isRecord(raw)) return null;

  const stage = raw.stage;
  if (isRecord(stage) && Array.isArray(stage.objects) && stage.objects.length > 0) {
    return { layout: 'stage', scenes: [transformObjects(stage.objects)] };
  }

  if (Array.isArray(raw.pages)) {
    const scenes: GliffyObject[][] = [];
    for (const page of raw.pages) {
      if (!isRecord(page) || !isRecord(page.scene)) continue;
      const objects = page.scene.objects;
      if (Array.isArray(objects)) {
        scenes.push(transformObjects(objects));
      }
    }
    return { layout: 'pages', scenes };
  }

  return null;
}
