/**
 * Z-order - stable ascending sort by source order
 */

import type { EmittedElement, ExcalidrawElement } from '../types.js';

/**
 * Sort emitted elements back-to-front
 *
 * Equal orders keep their emission order (Array.prototype.sort is stable).
 */
export function sortByOrder(emitted: readonly EmittedElement[]): ExcalidrawElement[] {
  return [...emitted].sort((a, b) => a.order - b.order).map(entry => entry.element);
}
