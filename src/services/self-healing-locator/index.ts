/**
 * Self-Healing Locator Service
 * Element location that adapts to UI changes
 */

export * from './types.js';
export * from './self-healing-locator.js';
export * from './strategies.js';
export * from './similarity.js';
export * from './image-comparator.js';
export * from './element-memory.js';
export * from './healing-cache.js';
export * from './healing-statistics.js';
export * from './cache-persistence.js';
