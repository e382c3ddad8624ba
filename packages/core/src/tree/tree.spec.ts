/**
 * Unit tests for @tensortree/core tree module
 */

import { describe, it, expect } from 'vitest';
import { EmptyBranchError } from '@tensortree/shared';
import {
  Branch,
  Leaf,
  computeDepth,
  createTree,
  isBranch,
  isLeaf,
  isSingleValued,
  isTerminalGroup,
  nodeLength,
  toMatchedValues,
} from './index.js';

function leaves(count: number, width: number): Leaf[] {
  return Array.from({ length: count }, (_, i) =>
    Leaf(Array.from({ length: width }, (_, v) => i * width + v))
  );
}

describe('computeDepth', () => {
  it('counts a leaf as 1', () => {
    expect(computeDepth(Leaf([1, 2, 3]))).toBe(1);
  });

  it('counts a branch of leaves as 2', () => {
    expect(computeDepth(Branch(leaves(4, 4)))).toBe(2);
  });

  it('returns 3 for sixteen branches of sixteen leaves', () => {
    const root = Branch(Array.from({ length: 16 }, () => Branch(leaves(16, 16))));
    expect(computeDepth(root)).toBe(3);
  });

  it('follows the deepest child of an irregular tree', () => {
    const root = Branch([Leaf([1]), Branch([Leaf([2]), Branch([Leaf([3])])]), Leaf([4])]);
    expect(computeDepth(root)).toBe(4);
  });

  it('fails on a branch without children', () => {
    expect(() => computeDepth(Branch([]))).toThrow(EmptyBranchError);
    expect(() => computeDepth(Branch([Leaf([1]), Branch([])]))).toThrow(EmptyBranchError);
  });
});

describe('createTree', () => {
  it('caches depth and variant', () => {
    const tree = createTree(Branch(leaves(8, 8)), '3');
    expect(tree.depth).toBe(2);
    expect(tree.variant).toBe('3');
    expect(Object.isFrozen(tree)).toBe(true);
  });

  it('fails for an empty root', () => {
    expect(() => createTree(Branch([]), '4')).toThrow('branch has no children');
  });
});

describe('shape predicates', () => {
  it('measures leaves by values and branches by children', () => {
    expect(nodeLength(Leaf([1, 2, 3]))).toBe(3);
    expect(nodeLength(Branch(leaves(5, 1)))).toBe(5);
  });

  it('detects single-valued nodes', () => {
    expect(isSingleValued(Leaf([0.5]))).toBe(true);
    expect(isSingleValued(Branch([Leaf([1, 2])]))).toBe(true);
    expect(isSingleValued(Leaf([0.5, 0.5]))).toBe(false);
  });

  it('treats up to four entries as a terminal group', () => {
    expect(isTerminalGroup(Leaf([1, 2, 3, 4]))).toBe(true);
    expect(isTerminalGroup(Branch(leaves(4, 16)))).toBe(true);
    expect(isTerminalGroup(Leaf([1, 2, 3, 4, 5]))).toBe(false);
    expect(isTerminalGroup(Branch(leaves(16, 1)))).toBe(false);
  });

  it('narrows node kinds', () => {
    expect(isLeaf(Leaf([1]))).toBe(true);
    expect(isBranch(Leaf([1]))).toBe(false);
    expect(isBranch(Branch([]))).toBe(true);
  });
});

describe('toMatchedValues', () => {
  it('converts leaves to values and branches to nested lists', () => {
    expect(toMatchedValues(Leaf([1, 2]))).toEqual([1, 2]);
    expect(toMatchedValues(Branch([Leaf([1]), Branch([Leaf([2, 3])])]))).toEqual([[1], [[2, 3]]]);
  });
});
