/**
 * Document assembly
 */

import type { BinaryFileData, ExcalidrawDocument, ExcalidrawElement } from '../types.js';
import { computeViewport } from './viewport.js';

export const DEFAULT_SOURCE = 'https://excalidraw.com';

export function createEmptyDocument(source = DEFAULT_SOURCE): ExcalidrawDocument {
  return {
    type: 'excalidraw',
    version: 2,
    source,
    elements: [],
    appState: {
      gridSize: null,
      viewBackgroundColor: '#ffffff',
    },
    files: {},
  };
}

/**
 * Wrap sorted elements and files into a document framed on its content
 */
export function assembleDocument(
  elements: ExcalidrawElement[],
  files: Record<string, BinaryFileData>,
  source = DEFAULT_SOURCE
): ExcalidrawDocument {
  const document = createEmptyDocument(source);
  document.elements = elements;
  document.files = files;

  const viewport = computeViewport(elements);
  if (viewport) {
    document.appState.scrollX = viewport.scrollX;
    document.appState.scrollY = viewport.scrollY;
    document.appState.zoom = { value: viewport.zoom };
  }
  return document;
}
