/**
 * Pipeline - main conversion pipeline
 * Orchestrates the transformation from a raw .gliffy document to an Excalidraw scene
 */

import { transformDocument } from '../api/transformers.js';
import type {
  BuildResult,
  ConversionContext,
  ConversionResult,
  ConvertOptions,
  ExcalidrawDocument,
  ExcalidrawElement,
  FlatNode,
  ImageResolver,
} from './types.js';
import { flattenScenes } from './normalize/flatten.js';
import { buildObjectInfo, indexNodes, visibleNodes } from './normalize/filter.js';
import { resolveArrowGeometry } from './layout/constraint-mapper.js';
import {
  addBoundElement,
  buildEllipse,
  buildEmergencyRectangle,
  buildImage,
  buildLine,
  buildRectangle,
  buildText,
  createElementFactory,
  wantsImage,
} from './generation/index.js';
import { assembleDocument, createEmptyDocument, sortByOrder } from './finalize/index.js';

/**
 * Fresh per-call state for a flattened node list
 */
export function createContext(
  nodes: readonly FlatNode[],
  resolver?: ImageResolver,
  options: ConvertOptions = {}
): ConversionContext {
  return {
    nodes,
    nodesById: indexNodes(nodes),
    objectInfo: buildObjectInfo(nodes),
    idMap: new Map(),
    elementsById: new Map(),
    emitted: [],
    arrowGeometry: new Map(),
    consumedTexts: new Set(),
    files: {},
    skipped: [],
    resolver,
    factory: createElementFactory(options),
  };
}

/**
 * Record a builder's outcome: elements, IdMap entries, files, or the skip
 */
function emit(context: ConversionContext, node: FlatNode, result: BuildResult): void {
  if (!result.ok) {
    context.skipped.push({ sourceId: node.id, detectedType: node.detectedType, reason: result.reason });
    return;
  }

  context.emitted.push({ element: result.element, order: node.order });
  context.elementsById.set(result.element.id, result.element);
  if (node.id !== undefined && !context.idMap.has(node.id)) {
    context.idMap.set(node.id, result.element.id);
  }

  for (const companion of result.companions ?? []) {
    context.emitted.push({ element: companion.element, order: companion.order });
    context.elementsById.set(companion.element.id, companion.element);
    const source = companion.source;
    if (source) {
      context.consumedTexts.add(source.index);
      if (source.id !== undefined && !context.idMap.has(source.id)) {
        context.idMap.set(source.id, companion.element.id);
      }
    }
  }

  if (result.file) {
    context.files[result.file.id] = result.file;
  }
}

function isShapeNode(node: FlatNode): boolean {
  return node.detectedType !== 'text' && node.detectedType !== 'arrow';
}

function buildShape(node: FlatNode, context: ConversionContext): BuildResult {
  if (wantsImage(node, context)) {
    const image = buildImage(node, context);
    if (image.ok) return image;
  }
  return node.detectedType === 'ellipse' ? buildEllipse(node, context) : buildRectangle(node, context);
}

/**
 * Run a builder for one node; an exception skips that node only
 */
function attempt<T extends ExcalidrawElement>(build: () => BuildResult<T>): BuildResult<T> {
  try {
    return build();
  } catch {
    return { ok: false, reason: 'InvalidGeometry' };
  }
}

function buildShapeSafely(node: FlatNode, context: ConversionContext): BuildResult {
  try {
    return buildShape(node, context);
  } catch {
    const emergency = attempt(() => buildEmergencyRectangle(node, context));
    return emergency.ok ? emergency : attempt(() => buildEmergencyRectangle(node, context, false));
  }
}

/**
 * Pass 1: shapes (rectangles, ellipses, images and unrecognized nodes)
 *
 * A node whose builder throws is drawn as an emergency rectangle.
 */
export function buildShapePass(context: ConversionContext): void {
  for (const node of visibleNodes(context.nodes)) {
    if (!isShapeNode(node)) continue;

    emit(context, node, buildShapeSafely(node, context));
  }
}

/**
 * Pass 2: resolve every arrow's polyline without emitting it yet
 */
export function indexArrowGeometry(context: ConversionContext): void {
  for (const node of visibleNodes(context.nodes)) {
    if (node.detectedType !== 'arrow' || node.id === undefined) continue;

    const geometry = resolveArrowGeometry(node, context.objectInfo);
    if (typeof geometry !== 'string') {
      context.arrowGeometry.set(node.id, geometry);
    }
  }
}

/**
 * Pass 3: texts not already emitted as a shape label
 *
 * A text whose builder throws is skipped.
 */
export function buildTextPass(context: ConversionContext): void {
  for (const node of visibleNodes(context.nodes)) {
    if (node.detectedType !== 'text') continue;
    if (context.consumedTexts.has(node.index)) continue;

    emit(context, node, attempt(() => buildText(node, context)));
  }
}

/**
 * Pass 4: arrow and line elements, bound against the complete IdMap
 */
export function buildArrowPass(context: ConversionContext): void {
  for (const node of visibleNodes(context.nodes)) {
    if (node.detectedType !== 'arrow') continue;

    const result = attempt(() => buildLine(node, context));
    emit(context, node, result);
    if (!result.ok) continue;

    const arrow = result.element;
    for (const binding of [arrow.startBinding, arrow.endBinding]) {
      const target = binding ? context.elementsById.get(binding.elementId) : undefined;
      if (target) {
        addBoundElement(target, { id: arrow.id, type: 'arrow' });
      }
    }
  }
}

/**
 * Pass order matters: containers must exist before texts bind to them, and
 * arrow geometry before labels are placed on it
 */
export const PASS_ORDER = [buildShapePass, indexArrowGeometry, buildTextPass, buildArrowPass] as const;

export function runPasses(context: ConversionContext): void {
  for (const pass of PASS_ORDER) {
    pass(context);
  }
}

/**
 * Stage 1: Parse + flatten
 * Returns null for input that is not a Gliffy document
 */
export function flatten(source: unknown): FlatNode[] | null {
  const diagram = transformDocument(source);
  if (!diagram) return null;
  return flattenScenes(diagram.scenes);
}

/**
 * Main pipeline with observability data
 *
 * Pipeline stages:
 * 1. Flatten: parse, absolutize coordinates, classify
 * 2. Build: the four ordered passes
 * 3. Finalize: z-order sort and viewport
 */
export function convertWithReport(
  source: unknown,
  resolver?: ImageResolver,
  options: ConvertOptions = {}
): ConversionResult {
  const nodes = flatten(source) ?? [];
  const hiddenNodes = nodes.filter(node => node.hidden).length;

  if (nodes.length === 0) {
    return {
      document: createEmptyDocument(options.source),
      skipped: [],
      stats: { sourceNodes: 0, hiddenNodes: 0, elements: 0, images: 0, skipped: 0 },
    };
  }

  const context = createContext(nodes, resolver, options);
  runPasses(context);

  const document = assembleDocument(sortByOrder(context.emitted), context.files, options.source);

  return {
    document,
    skipped: context.skipped,
    stats: {
      sourceNodes: nodes.length,
      hiddenNodes,
      elements: document.elements.length,
      images: document.elements.filter(element => element.type === 'image').length,
      skipped: context.skipped.length,
    },
  };
}

/**
 * Convert a parsed .gliffy document to an Excalidraw document
 *
 * Never throws: malformed input yields an empty document.
 */
export function convertGliffyToExcalidraw(
  source: unknown,
  resolver?: ImageResolver,
  options?: ConvertOptions
): ExcalidrawDocument {
  return convertWithReport(source, resolver, options).document;
}

/**
 * Export individual stages for debugging/testing
 */
export const stages = {
  flatten,
  createContext,
  buildShapePass,
  indexArrowGeometry,
  buildTextPass,
  buildArrowPass,
  runPasses,
};
