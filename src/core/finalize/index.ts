/**
 * Finalize - z-order, viewport and document assembly
 */

export { sortByOrder } from './z-order.js';
export { computeBounds, computeViewport, VIEWPORT_WIDTH, VIEWPORT_HEIGHT } from './viewport.js';
export type { Viewport } from './viewport.js';
export { createEmptyDocument, assembleDocument, DEFAULT_SOURCE } from './document.js';
