/**
 * Element factory - ids, bookkeeping fields and shared element construction
 */

import { nanoid } from 'nanoid';
import type {
  BoundElement,
  ConvertOptions,
  ElementBase,
  ElementFactory,
  ExcalidrawElement,
  TextElement,
} from '../types.js';
import { DEFAULT_STROKE_COLOR, DEFAULT_STROKE_WIDTH } from '../styles/extractor.js';
import { textBaseline } from '../layout/text-layout.js';

const TEXT_LINE_HEIGHT = 1.25;
/** Excalidraw "Virgil" hand-drawn font */
const FONT_FAMILY_HAND_DRAWN = 1;

/**
 * Create the id/seed/clock source for one conversion
 */
export function createElementFactory(options: ConvertOptions = {}): ElementFactory {
  const random = options.random ?? Math.random;
  const now = options.now ?? Date.now;
  const issued = new Set<string>();

  return {
    newId(prefix: string): string {
      let id = `${prefix}_${nanoid(10)}`;
      while (issued.has(id)) {
        id = `${prefix}_${nanoid(10)}`;
      }
      issued.add(id);
      return id;
    },
    randomInt(): number {
      return Math.floor(random() * 2 ** 31);
    },
    now,
  };
}

/**
 * Fields shared by every element, with Excalidraw's defaults
 */
export function createBaseFields(factory: ElementFactory, prefix: string): ElementBase {
  return {
    id: factory.newId(prefix),
    x: 0,
    y: 0,
    width: 0,
    height: 0,
    angle: 0,
    strokeColor: DEFAULT_STROKE_COLOR,
    backgroundColor: 'transparent',
    fillStyle: 'solid',
    strokeWidth: DEFAULT_STROKE_WIDTH,
    strokeStyle: 'solid',
    roughness: 1,
    opacity: 100,
    groupIds: [],
    frameId: null,
    roundness: null,
    boundElements: null,
    seed: factory.randomInt(),
    version: 1,
    versionNonce: factory.randomInt(),
    updated: factory.now(),
    isDeleted: false,
    locked: false,
    link: null,
  };
}

export interface TextFields {
  text: string;
  originalText: string;
  fontSize: number;
  x: number;
  y: number;
  width: number;
  height: number;
  angle?: number;
  strokeColor?: string;
  containerId?: string | null;
}

/**
 * Create a centered text element
 */
export function createTextElement(factory: ElementFactory, fields: TextFields): TextElement {
  return {
    ...createBaseFields(factory, 'text'),
    type: 'text',
    x: fields.x,
    y: fields.y,
    width: fields.width,
    height: fields.height,
    angle: fields.angle ?? 0,
    strokeColor: fields.strokeColor ?? DEFAULT_STROKE_COLOR,
    text: fields.text,
    originalText: fields.originalText,
    fontSize: fields.fontSize,
    fontFamily: FONT_FAMILY_HAND_DRAWN,
    textAlign: 'center',
    verticalAlign: 'middle',
    containerId: fields.containerId ?? null,
    baseline: textBaseline(fields.fontSize),
    lineHeight: TEXT_LINE_HEIGHT,
  };
}

/**
 * Height of a block of text at the standard line height
 */
export function textBlockHeight(text: string, fontSize: number): number {
  return text.split('\n').length * fontSize * TEXT_LINE_HEIGHT;
}

/**
 * Record that `ref` is attached to `element`
 */
export function addBoundElement(element: ExcalidrawElement, ref: BoundElement): void {
  if (element.boundElements === null) {
    element.boundElements = [];
  }
  if (!element.boundElements.some(existing => existing.id === ref.id)) {
    element.boundElements.push(ref);
  }
}

/**
 * Elements that can host bound text
 */
export function isContainerElement(element: ExcalidrawElement | undefined): boolean {
  return (
    element?.type === 'rectangle' || element?.type === 'ellipse' || element?.type === 'diamond'
  );
}

/**
 * Excalidraw shows a single bound text per container
 */
export function hasBoundText(element: ExcalidrawElement): boolean {
  return element.boundElements?.some(ref => ref.type === 'text') ?? false;
}
