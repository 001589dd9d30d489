/**
 * Text builder - free-standing text, container-bound text and arrow labels
 */

import type { BuildResult, ConversionContext, ExcalidrawElement, FlatNode, TextElement } from '../types.js';
import {
  DEFAULT_SHAPE_FONT_SIZE,
  DEFAULT_TEXT_COLOR,
  extractFontSize,
  getTextContent,
  getTextHtml,
  labelFontSize,
} from '../styles/text.js';
import { getStrokeColor } from '../styles/extractor.js';
import { polylineMidpoint } from '../layout/constraint-mapper.js';
import { CONTAINER_TEXT_MARGIN, estimateLabelSize, wrapText } from '../layout/text-layout.js';
import {
  addBoundElement,
  createTextElement,
  hasBoundText,
  isContainerElement,
  textBlockHeight,
} from './element-factory.js';
import { isArrowLabel } from './shape-label.js';
import { degreesToRadians } from './rectangle-builder.js';

function parentElement(node: FlatNode, context: ConversionContext): ExcalidrawElement | undefined {
  if (node.parentId === undefined) return undefined;
  const elementId = context.idMap.get(node.parentId);
  return elementId === undefined ? undefined : context.elementsById.get(elementId);
}

/**
 * Label floating on an arrow, centered on the middle point of its polyline
 *
 * Without resolved geometry (the arrow itself was dropped) the label stays
 * at its own position.
 */
function buildArrowLabel(node: FlatNode, text: string, context: ConversionContext): TextElement {
  const fontSize = labelFontSize(getTextHtml(node));
  const size = estimateLabelSize(text, fontSize);
  const geometry = node.parentId === undefined ? undefined : context.arrowGeometry.get(node.parentId);
  const midpoint = geometry ? polylineMidpoint(geometry.points) : null;

  return createTextElement(context.factory, {
    text,
    originalText: text,
    fontSize,
    x: midpoint ? midpoint[0] - size.width / 2 : node.x,
    y: midpoint ? midpoint[1] - size.height / 2 : node.y,
    width: size.width,
    height: size.height,
    strokeColor: getStrokeColor(node, DEFAULT_TEXT_COLOR),
  });
}

function buildContainedText(
  node: FlatNode,
  text: string,
  container: ExcalidrawElement,
  context: ConversionContext
): TextElement {
  const fontSize = extractFontSize(getTextHtml(node), DEFAULT_SHAPE_FONT_SIZE);
  const available = container.width - CONTAINER_TEXT_MARGIN;
  const wrapped = available > 0 ? wrapText(text, available, fontSize) : text;
  const width = available > 0 ? available : container.width;
  const height = textBlockHeight(wrapped, fontSize);

  const element = createTextElement(context.factory, {
    text: wrapped,
    originalText: text,
    fontSize,
    x: container.x + (container.width - width) / 2,
    y: container.y + (container.height - height) / 2,
    width,
    height,
    angle: container.angle,
    strokeColor: getStrokeColor(node, DEFAULT_TEXT_COLOR),
    containerId: container.id,
  });

  addBoundElement(container, { id: element.id, type: 'text' });
  return element;
}

function buildFreeText(node: FlatNode, text: string, context: ConversionContext): TextElement {
  const fontSize = extractFontSize(getTextHtml(node), DEFAULT_SHAPE_FONT_SIZE);
  const estimated = estimateLabelSize(text, fontSize);

  return createTextElement(context.factory, {
    text,
    originalText: text,
    fontSize,
    x: node.x,
    y: node.y,
    width: node.width > 0 ? node.width : estimated.width,
    height: node.height > 0 ? node.height : textBlockHeight(text, fontSize),
    angle: degreesToRadians(node.rotation),
    strokeColor: getStrokeColor(node, DEFAULT_TEXT_COLOR),
  });
}

export function buildText(node: FlatNode, context: ConversionContext): BuildResult<TextElement> {
  const text = getTextContent(node);
  if (!text) {
    return { ok: false, reason: 'EmptyText' };
  }

  if (isArrowLabel(node, context)) {
    return { ok: true, element: buildArrowLabel(node, text, context) };
  }

  // Further texts of an already labelled container stay free
  const container = parentElement(node, context);
  if (container && isContainerElement(container) && !hasBoundText(container)) {
    return { ok: true, element: buildContainedText(node, text, container, context) };
  }

  return { ok: true, element: buildFreeText(node, text, context) };
}
