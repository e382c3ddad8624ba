/**
 * @tensortree/engine
 * Quadrant tables, traversal and the lookup engine
 */

export * from './api/index.js';
export * from './quadrants/index.js';
export * from './traversal/index.js';
export * from './compute/index.js';
