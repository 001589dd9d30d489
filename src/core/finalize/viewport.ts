/**
 * Viewport - initial scroll and zoom that frame the whole diagram
 */

import type { BoundingBox, ExcalidrawElement } from '../types.js';

export const VIEWPORT_WIDTH = 1200;
export const VIEWPORT_HEIGHT = 800;
const FIT_RATIO = 0.9;
const MIN_ZOOM = 0.2;
const MAX_ZOOM = 1;

export interface Viewport {
  scrollX: number;
  scrollY: number;
  zoom: number;
}

function elementCorners(element: ExcalidrawElement): Array<[number, number]> {
  if (element.type === 'line' || element.type === 'arrow') {
    return element.points.map(([dx, dy]): [number, number] => [element.x + dx, element.y + dy]);
  }
  return [
    [element.x, element.y],
    [element.x + element.width, element.y + element.height],
  ];
}

/**
 * Union bounding box of all elements; linear elements count by their points
 */
export function computeBounds(elements: readonly ExcalidrawElement[]): BoundingBox | null {
  const corners = elements.flatMap(elementCorners);
  if (corners.length === 0) return null;

  let [minX, minY] = corners[0];
  let [maxX, maxY] = corners[0];
  for (const [x, y] of corners) {
    minX = Math.min(minX, x);
    minY = Math.min(minY, y);
    maxX = Math.max(maxX, x);
    maxY = Math.max(maxY, y);
  }

  return { x: minX, y: minY, width: maxX - minX, height: maxY - minY };
}

function fitZoom(viewportSize: number, diagramSize: number): number {
  return diagramSize > 0 ? (viewportSize * FIT_RATIO) / diagramSize : 1;
}

/**
 * Center the bounds in a 1200×800 viewport, zoomed out (never in) to fit
 */
export function computeViewport(elements: readonly ExcalidrawElement[]): Viewport | null {
  const bounds = computeBounds(elements);
  if (!bounds) return null;

  const centerX = bounds.x + bounds.width / 2;
  const centerY = bounds.y + bounds.height / 2;
  const zoom = Math.min(
    fitZoom(VIEWPORT_WIDTH, bounds.width),
    fitZoom(VIEWPORT_HEIGHT, bounds.height),
    MAX_ZOOM
  );

  return {
    scrollX: centerX - VIEWPORT_WIDTH / 2,
    scrollY: centerY - VIEWPORT_HEIGHT / 2,
    zoom: Math.max(zoom, MIN_ZOOM),
  };
}
