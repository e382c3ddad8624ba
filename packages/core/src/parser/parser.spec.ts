/**
 * Unit tests for @tensortree/core parser module
 */

import { describe, it, expect } from 'vitest';
import {
  FormatError,
  MalformedNumberError,
  NumberFormatError,
  UnexpectedEndOfInputError,
} from '@tensortree/shared';
import { buildTree, parseDocument, parseTree } from './index.js';
import { Branch, Leaf } from '../tree/index.js';
import type { Token } from '../lexer/index.js';

describe('parseDocument', () => {
  it('builds a root of four leaves', () => {
    const root = parseDocument('{ {1 2 3 4}{5 6 7 8}{9 10 11 12}{13 14 15 16} }');
    expect(root).toEqual(
      Branch([Leaf([1, 2, 3, 4]), Leaf([5, 6, 7, 8]), Leaf([9, 10, 11, 12]), Leaf([13, 14, 15, 16])])
    );
  });

  it('keeps nested branches in slot order', () => {
    const root = parseDocument('{ { {0.5} {0.25 0.75} } {2} }');
    expect(root).toEqual(Branch([Branch([Leaf([0.5]), Leaf([0.25, 0.75])]), Leaf([2])]));
  });

  it('groups number runs between nested groups into leaf children', () => {
    expect(parseDocument('{1 2 {3} 4}')).toEqual(Branch([Leaf([1, 2]), Leaf([3]), Leaf([4])]));
    expect(parseDocument('{ {1 {2 3} 4} }')).toEqual(
      Branch([Branch([Leaf([1]), Leaf([2, 3]), Leaf([4])])])
    );
  });

  it('wraps a number-only document in a root branch', () => {
    expect(parseDocument('{1 2 3}')).toEqual(Branch([Leaf([1, 2, 3])]));
  });

  it('keeps empty groups as childless branches', () => {
    expect(parseDocument('{}')).toEqual(Branch([]));
    expect(parseDocument('{ {} }')).toEqual(Branch([Branch([])]));
  });

  it('parses numbers as float64', () => {
    expect(parseDocument('{ -1.5e2, +.5 }')).toEqual(Branch([Leaf([-150, 0.5])]));
  });

  it('freezes the built nodes', () => {
    const root = parseDocument('{ {1 2} {3} }');
    expect(Object.isFrozen(root)).toBe(true);
    expect(Object.isFrozen(root.children)).toBe(true);
    expect(Object.isFrozen(root.children[0])).toBe(true);
  });

  it('fails without an opening brace', () => {
    expect(() => parseDocument('1 2 }')).toThrow(new FormatError('missing opening brace'));
    expect(() => parseDocument('')).toThrow('missing opening brace');
    expect(() => parseDocument('}')).toThrow(FormatError);
  });

  it('fails on a missing closing brace', () => {
    expect(() => parseDocument('{1 2 3')).toThrow(UnexpectedEndOfInputError);
  });

  it('reports how many groups were left open', () => {
    try {
      parseDocument('{ {1 2');
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(UnexpectedEndOfInputError);
      if (err instanceof UnexpectedEndOfInputError) {
        expect(err.openGroups).toBe(2);
      }
    }
  });

  it('rejects content after the root in strict mode', () => {
    expect(() => parseDocument('{1} 2')).toThrow(
      'unexpected content after closing brace at offset 4'
    );
  });

  it('propagates tokenizer errors in strict mode', () => {
    expect(() => parseDocument('{1 x 2}')).toThrow(MalformedNumberError);
  });

  it('ignores stray characters and trailing content in lenient mode', () => {
    expect(parseDocument('{1 x 2}', { strict: false })).toEqual(Branch([Leaf([1, 2])]));
    expect(parseDocument('{1} 2 {', { strict: false })).toEqual(Branch([Leaf([1])]));
  });
});

describe('buildTree', () => {
  it('consumes a token sequence', () => {
    const tokens: Token[] = [
      { kind: 'open', offset: 0 },
      { kind: 'number', offset: 1, literal: '7' },
      { kind: 'close', offset: 2 },
    ];
    expect(buildTree(tokens)).toEqual(Branch([Leaf([7])]));
  });

  it('fails on a literal that does not parse', () => {
    const tokens: Token[] = [
      { kind: 'open', offset: 0 },
      { kind: 'number', offset: 1, literal: '1.2.3' },
      { kind: 'close', offset: 6 },
    ];
    expect(() => buildTree(tokens)).toThrow(NumberFormatError);
    expect(() => buildTree(tokens)).toThrow("offset 1: cannot parse number literal '1.2.3'");
  });

  it.each(['', ' ', '0x1F', '0b11', 'Infinity', '-NaN'])(
    'rejects literal %j outside the number grammar',
    (literal) => {
      const tokens: Token[] = [
        { kind: 'open', offset: 0 },
        { kind: 'number', offset: 1, literal },
        { kind: 'close', offset: 2 },
      ];
      expect(() => buildTree(tokens)).toThrow(NumberFormatError);
    }
  );

  it('accepts every literal form the tokenizer emits', () => {
    const tokens: Token[] = [
      { kind: 'open', offset: 0 },
      { kind: 'number', offset: 1, literal: '+.5' },
      { kind: 'number', offset: 5, literal: '6.' },
      { kind: 'number', offset: 8, literal: '-2E+1' },
      { kind: 'close', offset: 14 },
    ];
    expect(buildTree(tokens)).toEqual(Branch([Leaf([0.5, 6, -20])]));
  });
});

describe('parseTree', () => {
  it('computes the depth of the parsed root', () => {
    const tree = parseTree('{ {1 2 3 4}{5 6 7 8}{9 10 11 12}{13 14 15 16} }', '4');
    expect(tree.depth).toBe(2);
    expect(tree.variant).toBe('4');
    expect(tree.root.children).toHaveLength(4);
  });
});
