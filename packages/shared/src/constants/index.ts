/**
 * Tensor tree format constants
 */

import type { DataDefinition, DataDirection, TreeVariant } from '../types/index.js';

// ============================================================================
// Branching
// ============================================================================

/** Children per branch in the anisotropic variant */
export const ANISOTROPIC_BRANCH_ARITY = 16;

/** Children per branch in the isotropic variant */
export const ISOTROPIC_BRANCH_ARITY = 8;

/** Slots selected by every index table */
export const SLOTS_PER_SELECTION = 4;

/** Children of a quadrant-group branch (one child per quadrant) */
export const QUADRANT_GROUP_COUNT = 4;

/** Stride of the isotropic root walk */
export const ISOTROPIC_ROOT_STRIDE = 2;

/** Magnitude splitting the two isotropic bands */
export const ISOTROPIC_BAND_SPLIT = 0.5;

// ============================================================================
// Terminal Shapes
// ============================================================================

/** Length of a node that ends traversal immediately */
export const SINGLE_VALUE_LENGTH = 1;

/** Nodes up to this length are returned as-is instead of descended */
export const MAX_TERMINAL_GROUP_LENGTH = 4;

// ============================================================================
// Query Domain
// ============================================================================

/** Lower bound of normalized incident coordinates */
export const QUERY_MIN = -1;

/** Upper bound of normalized incident coordinates */
export const QUERY_MAX = 1;

// ============================================================================
// Container Metadata
// ============================================================================

/** Wavelength data directions in container order */
export const DATA_DIRECTIONS = [
  'Transmission Front',
  'Transmission Back',
  'Reflection Front',
  'Reflection Back',
] as const satisfies readonly DataDirection[];

/** Incident data structure name to tree variant */
export const DEFINITION_VARIANTS: Readonly<Record<DataDefinition, TreeVariant>> = {
  TensorTree3: '3',
  TensorTree4: '4',
};
