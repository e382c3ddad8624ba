/**
 * Tensor tree traversal
 *
 * Descends a tree for an incident position. At every level the coordinate is
 * recentered onto the sub-cell it falls in (step 1/2^level), and the quadrant
 * tables pick the slots to follow: branch tables while the next level is above
 * the tree depth, leaf tables at the final level.
 *
 * Levels are passed down explicitly, so lookups share no state and any number may
 * run against the same tree.
 */

import {
  QUADRANT_GROUP_COUNT,
  StructuralMismatchError,
  recenter,
  type MatchedValues,
  type TableKind,
  type TreeVariant,
} from '@tensortree/shared';
import {
  isSingleValued,
  isTerminalGroup,
  toMatchedValues,
  type Branch,
  type Leaf,
  type Tree,
  type TreeNode,
} from '@tensortree/core';
import { rootSlots, selectSlots } from '../quadrants/index.js';

/** Level of the root node in mismatch errors; its children are descended at level 1 */
const ROOT_LEVEL = 0;

// ============================================================================
// Public API
// ============================================================================

/**
 * Look up the matched values for an incident position.
 *
 * Returns one entry per slot selected at the root: four quadrant groups for the
 * anisotropic variant, the even slots 0, 2, 4, 6 for the isotropic one. Positions
 * outside [-1, 1] are not clamped.
 *
 * @throws StructuralMismatchError if a selected slot does not exist in the tree
 */
export function lookupTree(tree: Tree, x: number, y = 0): MatchedValues[] {
  const slots = rootSlots(tree.variant, x, y);
  return pickChildren(tree.variant, tree.root, slots, 'branch', ROOT_LEVEL).map((child) =>
    visit(tree, child, x, y, 1)
  );
}

/**
 * Descend one node at the given level (1 for a child of the root).
 *
 * A single-valued node is returned as-is. A leaf yields the values at the
 * selected slots. A branch yields one entry per selected child: children longer
 * than four entries are descended further, shorter ones returned as-is.
 */
export function traverseQuadrant(tree: Tree, node: TreeNode, x: number, y: number, level = 1): MatchedValues {
  if (isSingleValued(node)) return toMatchedValues(node);

  const nx = recenter(x, level);
  const ny = tree.variant === '4' ? recenter(y, level) : y;
  const next = level + 1;
  const kind: TableKind = next < tree.depth ? 'branch' : 'leaf';
  const slots = selectSlots(tree.variant, kind, nx, ny);

  if (node.kind === 'leaf') {
    return pickValues(node, slots, level);
  }
  return pickChildren(tree.variant, node, slots, kind, level).map((child) =>
    visit(tree, child, nx, ny, next)
  );
}

/**
 * Depth-first flattening of matched values
 */
export function flattenMatches(matches: MatchedValues): number[] {
  const values: number[] = [];
  const walk = (entry: number | MatchedValues) => {
    if (typeof entry === 'number') {
      values.push(entry);
      return;
    }
    for (const inner of entry) walk(inner);
  };
  walk(matches);
  return values;
}

// ============================================================================
// Internals
// ============================================================================

function visit(tree: Tree, node: TreeNode, x: number, y: number, level: number): MatchedValues {
  return isTerminalGroup(node) ? toMatchedValues(node) : traverseQuadrant(tree, node, x, y, level);
}

function pickValues(leaf: Leaf, slots: readonly number[], level: number): number[] {
  assertSlots(slots, leaf.values.length, level);
  return slots.map((slot) => leaf.values[slot]);
}

/**
 * Children at the selected slots. An anisotropic root of exactly four children
 * holds one child per quadrant group and resolves to the child at the group's
 * leading slot. Below the root every selected slot must exist.
 */
function pickChildren(
  variant: TreeVariant,
  branch: Branch,
  slots: readonly number[],
  kind: TableKind,
  level: number
): TreeNode[] {
  if (
    level === ROOT_LEVEL &&
    variant === '4' &&
    kind === 'branch' &&
    branch.children.length === QUADRANT_GROUP_COUNT
  ) {
    return [branch.children[slots[0]]];
  }
  assertSlots(slots, branch.children.length, level);
  return slots.map((slot) => branch.children[slot]);
}

function assertSlots(slots: readonly number[], length: number, level: number): void {
  const needed = Math.max(...slots) + 1;
  if (needed > length) {
    throw new StructuralMismatchError(needed, length, level);
  }
}
