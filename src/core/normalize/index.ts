/**
 * Normalize module - flattening and visibility filtering
 */

export { flattenObjects, flattenScenes, normalizeOrder } from './flatten.js';
export { isHidden, visibleNodes, indexNodes, buildObjectInfo } from './filter.js';
