/**
 * Quadrant index tables
 *
 * Each table maps the sign (anisotropic) or magnitude band (isotropic) of a
 * recentered coordinate to the ordered child slots to visit next. Slot order is
 * part of the format: it names the spatial cell each child covers.
 */

import {
  ANISOTROPIC_BRANCH_ARITY,
  ISOTROPIC_BAND_SPLIT,
  ISOTROPIC_BRANCH_ARITY,
  ISOTROPIC_ROOT_STRIDE,
  SLOTS_PER_SELECTION,
  range,
  type TableKind,
  type TreeVariant,
} from '@tensortree/shared';

// ============================================================================
// Sign Classification
// ============================================================================

/** Quadrant of (x, y); zero and -0 count as non-negative */
export type Quadrant = 'neg-neg' | 'neg-pos' | 'pos-neg' | 'pos-pos';

/** Isotropic magnitude band */
export type Band = 'inner' | 'outer';

export function quadrantOf(x: number, y: number): Quadrant {
  if (x < 0) {
    return y < 0 ? 'neg-neg' : 'neg-pos';
  }
  return y < 0 ? 'pos-neg' : 'pos-pos';
}

export function bandOf(x: number): Band {
  return Math.abs(x) <= ISOTROPIC_BAND_SPLIT ? 'inner' : 'outer';
}

// ============================================================================
// Tables
// ============================================================================

const ANISOTROPIC_STRIDE = ANISOTROPIC_BRANCH_ARITY / SLOTS_PER_SELECTION;
const ISOTROPIC_STRIDE = ISOTROPIC_BRANCH_ARITY / SLOTS_PER_SELECTION;

function slots(start: number, end: number, step: number): readonly number[] {
  return Object.freeze(range(start, end, step));
}

function block(index: number): readonly number[] {
  return slots(index * SLOTS_PER_SELECTION, (index + 1) * SLOTS_PER_SELECTION, 1);
}

const ANISOTROPIC_BRANCH_TABLE: Readonly<Record<Quadrant, readonly number[]>> = {
  'neg-neg': slots(0, ANISOTROPIC_BRANCH_ARITY, ANISOTROPIC_STRIDE),
  'neg-pos': slots(2, ANISOTROPIC_BRANCH_ARITY, ANISOTROPIC_STRIDE),
  'pos-neg': slots(1, ANISOTROPIC_BRANCH_ARITY, ANISOTROPIC_STRIDE),
  'pos-pos': slots(3, ANISOTROPIC_BRANCH_ARITY, ANISOTROPIC_STRIDE),
};

const ANISOTROPIC_LEAF_TABLE: Readonly<Record<Quadrant, readonly number[]>> = {
  'neg-neg': block(0),
  'neg-pos': block(1),
  'pos-neg': block(2),
  'pos-pos': block(3),
};

const ISOTROPIC_BRANCH_TABLE: Readonly<Record<Band, readonly number[]>> = {
  inner: slots(0, ISOTROPIC_BRANCH_ARITY, ISOTROPIC_STRIDE),
  outer: slots(1, ISOTROPIC_BRANCH_ARITY, ISOTROPIC_STRIDE),
};

const ISOTROPIC_LEAF_TABLE: Readonly<Record<Band, readonly number[]>> = {
  inner: block(0),
  outer: block(1),
};

/** The isotropic root walks every other slot; no second coordinate to split on */
export const ISOTROPIC_ROOT_SLOTS: readonly number[] = slots(
  0,
  ISOTROPIC_BRANCH_ARITY,
  ISOTROPIC_ROOT_STRIDE
);

// ============================================================================
// Lookups
// ============================================================================

/** Step-4 slots among 16 children while the tree continues */
export function anisotropicBranchSlots(x: number, y: number): readonly number[] {
  return ANISOTROPIC_BRANCH_TABLE[quadrantOf(x, y)];
}

/** Contiguous block of 4 among 16 slots at the final level */
export function anisotropicLeafSlots(x: number, y: number): readonly number[] {
  return ANISOTROPIC_LEAF_TABLE[quadrantOf(x, y)];
}

/** Step-2 slots among 8 children while the tree continues */
export function isotropicBranchSlots(x: number): readonly number[] {
  return ISOTROPIC_BRANCH_TABLE[bandOf(x)];
}

/** Contiguous block of 4 among 8 slots at the final level */
export function isotropicLeafSlots(x: number): readonly number[] {
  return ISOTROPIC_LEAF_TABLE[bandOf(x)];
}

/**
 * Slots for a variant and table family. `y` is ignored by the isotropic variant.
 */
export function selectSlots(variant: TreeVariant, kind: TableKind, x: number, y: number): readonly number[] {
  if (variant === '4') {
    return kind === 'branch' ? anisotropicBranchSlots(x, y) : anisotropicLeafSlots(x, y);
  }
  return kind === 'branch' ? isotropicBranchSlots(x) : isotropicLeafSlots(x);
}

/**
 * Slots selected at the root, from the raw (not recentered) coordinate
 */
export function rootSlots(variant: TreeVariant, x: number, y: number): readonly number[] {
  return variant === '4' ? anisotropicBranchSlots(x, y) : ISOTROPIC_ROOT_SLOTS;
}
