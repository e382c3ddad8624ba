/**
 * Shared utility functions
 */

import { QUERY_MAX, QUERY_MIN } from '../constants/index.js';

// ============================================================================
// Numeric Utilities
// ============================================================================

/**
 * Check if a coordinate lies inside the normalized query domain
 */
export function isWithinQueryDomain(value: number): boolean {
  return value >= QUERY_MIN && value <= QUERY_MAX;
}

/**
 * Recenter a coordinate onto the sub-cell it falls in at the given level.
 * Negative values move up by 1/2^level, everything else (including -0) moves down.
 */
export function recenter(value: number, level: number): number {
  const step = 1 / Math.pow(2, level);
  return value < 0 ? value + step : value - step;
}

// ============================================================================
// Array Utilities
// ============================================================================

/**
 * Create a range of numbers
 */
export function range(start: number, end: number, step = 1): number[] {
  const result: number[] = [];
  for (let i = start; i < end; i += step) {
    result.push(i);
  }
  return result;
}

// ============================================================================
// Timing
// ============================================================================

/**
 * Milliseconds elapsed since a performance.now() mark
 */
export function elapsedMs(start: number): number {
  return performance.now() - start;
}
