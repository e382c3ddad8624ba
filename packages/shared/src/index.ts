/**
 * @tensortree/shared
 * Shared types, format constants, errors and utilities
 */

export * from './types/index.js';
export * from './constants/index.js';
export * from './errors/index.js';
export * from './utils/index.js';
