/**
 * In-shape label lookup and construction
 */

import type { ConversionContext, FlatNode, ShapeElement, TextElement } from '../types.js';
import {
  DEFAULT_SHAPE_FONT_SIZE,
  DEFAULT_TEXT_COLOR,
  extractFontSize,
  getTextContent,
  getTextHtml,
} from '../styles/text.js';
import { getStrokeColor } from '../styles/extractor.js';
import { CONTAINER_TEXT_MARGIN, inShapeFontSize, wrapText } from '../layout/text-layout.js';
import { addBoundElement, createTextElement, textBlockHeight } from './element-factory.js';

export interface ShapeLabel {
  text: string;
  html?: string;
  /** Node the label was read from (the shape itself or a text child) */
  source: FlatNode;
  /** Set when the label comes from a separate text child */
  child?: FlatNode;
}

/**
 * A text whose parent is an arrow is that arrow's label, never a shape's
 */
export function isArrowLabel(node: FlatNode, context: ConversionContext): boolean {
  if (node.parentId === undefined) return false;
  if (context.arrowGeometry.has(node.parentId)) return true;
  return context.nodesById.get(node.parentId)?.detectedType === 'arrow';
}

/**
 * Find the label of a shape: text set on the node itself, else the first
 * visible non-empty text child that is not an arrow label
 */
export function findShapeLabel(node: FlatNode, context: ConversionContext): ShapeLabel | null {
  const own = getTextContent(node);
  if (own) {
    return { text: own, html: getTextHtml(node), source: node };
  }
  if (node.id === undefined) return null;

  for (const child of context.nodes) {
    if (child.parentId !== node.id || child.hidden || child.detectedType !== 'text') continue;
    if (context.consumedTexts.has(child.index) || isArrowLabel(child, context)) continue;

    const text = getTextContent(child);
    if (text) {
      return { text, html: getTextHtml(child), source: child, child };
    }
  }
  return null;
}

/**
 * Build the text element bound inside `container` and register it on the container
 */
export function buildBoundLabel(
  container: ShapeElement,
  label: ShapeLabel,
  context: ConversionContext
): TextElement {
  const fontSize = inShapeFontSize(extractFontSize(label.html, DEFAULT_SHAPE_FONT_SIZE));
  const available = container.width - CONTAINER_TEXT_MARGIN;
  const text = available > 0 ? wrapText(label.text, available, fontSize) : label.text;
  const width = available > 0 ? available : container.width;
  const height = textBlockHeight(text, fontSize);

  const element = createTextElement(context.factory, {
    text,
    originalText: label.text,
    fontSize,
    x: container.x + (container.width - width) / 2,
    y: container.y + (container.height - height) / 2,
    width,
    height,
    angle: container.angle,
    strokeColor: getStrokeColor(label.source, DEFAULT_TEXT_COLOR),
    containerId: container.id,
  });

  addBoundElement(container, { id: element.id, type: 'text' });
  return element;
}
