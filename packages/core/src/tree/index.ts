/**
 * Tensor tree model
 *
 * Nodes are tagged at build time: a leaf holds scattering values for one angular
 * cell, a branch holds its children in slot order. Slot order carries the
 * spatial meaning of each child and is never changed.
 */

import {
  EmptyBranchError,
  MAX_TERMINAL_GROUP_LENGTH,
  SINGLE_VALUE_LENGTH,
  type MatchedValues,
  type TreeVariant,
} from '@tensortree/shared';

// ============================================================================
// Node Types
// ============================================================================

export interface Leaf {
  readonly kind: 'leaf';
  readonly values: readonly number[];
}

export interface Branch {
  readonly kind: 'branch';
  readonly children: readonly TreeNode[];
}

export type TreeNode = Leaf | Branch;

/** A parsed data block, immutable after construction */
export interface Tree {
  readonly root: Branch;
  /** Maximum nesting level below and including the root */
  readonly depth: number;
  readonly variant: TreeVariant;
}

// ============================================================================
// Factory Functions
// ============================================================================

export function Leaf(values: readonly number[]): Leaf {
  return Object.freeze({ kind: 'leaf', values: Object.freeze([...values]) });
}

export function Branch(children: readonly TreeNode[]): Branch {
  return Object.freeze({ kind: 'branch', children: Object.freeze([...children]) });
}

// ============================================================================
// Type Guards
// ============================================================================

export function isLeaf(node: TreeNode): node is Leaf {
  return node.kind === 'leaf';
}

export function isBranch(node: TreeNode): node is Branch {
  return node.kind === 'branch';
}

// ============================================================================
// Shape Predicates
// ============================================================================

/** Number of values (leaf) or children (branch) */
export function nodeLength(node: TreeNode): number {
  return node.kind === 'leaf' ? node.values.length : node.children.length;
}

/**
 * A node of exactly one entry. Sparse trees stop subdividing a cell this way,
 * so traversal returns it without descending.
 */
export function isSingleValued(node: TreeNode): boolean {
  return nodeLength(node) === SINGLE_VALUE_LENGTH;
}

/**
 * A node of at most four entries. Traversal takes such a node as a finished
 * group of values and returns it as-is; longer nodes are descended.
 */
export function isTerminalGroup(node: TreeNode): boolean {
  return nodeLength(node) <= MAX_TERMINAL_GROUP_LENGTH;
}

// ============================================================================
// Depth
// ============================================================================

/**
 * Maximum nesting depth: a leaf counts 1, a branch 1 + its deepest child.
 *
 * @throws EmptyBranchError if any branch has no children
 */
export function computeDepth(node: TreeNode): number {
  if (node.kind === 'leaf') return 1;
  if (node.children.length === 0) throw new EmptyBranchError();

  let deepest = 0;
  for (const child of node.children) {
    deepest = Math.max(deepest, computeDepth(child));
  }
  return deepest + 1;
}

/**
 * Wrap a parsed root into a tree, computing its depth once
 */
export function createTree(root: Branch, variant: TreeVariant): Tree {
  return Object.freeze({ root, depth: computeDepth(root), variant });
}

// ============================================================================
// Conversion
// ============================================================================

/**
 * Nested-array form of a node: a leaf becomes its values, a branch the list of
 * its converted children.
 */
export function toMatchedValues(node: TreeNode): MatchedValues {
  if (node.kind === 'leaf') return node.values;
  return node.children.map(toMatchedValues);
}
