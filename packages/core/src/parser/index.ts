/**
 * Recursive descent tree builder for tensor tree text.
 *
 * Grammar:
 *   document   := '{' node-list '}'
 *   node-list  := (node | number)*
 *   node       := document
 *
 * A nested group holding only numbers is a leaf. A group holding nested groups
 * is a branch; runs of numbers between its nested groups become leaf children.
 * The document's outer braces always form the root branch.
 */

import {
  FormatError,
  NumberFormatError,
  UnexpectedEndOfInputError,
  type TreeVariant,
} from '@tensortree/shared';
import {
  NUMBER_LITERAL_PATTERN,
  tokenize,
  type NumberToken,
  type Token,
  type TokenizeOptions,
} from '../lexer/index.js';
import { Branch, Leaf, createTree, type Tree, type TreeNode } from '../tree/index.js';

export type ParseOptions = TokenizeOptions;

/** Entries of one brace group, before it is shaped into a node */
interface GroupContent {
  entries: TreeNode[];
  numbersOnly: boolean;
}

/**
 * Build the root branch from a token sequence.
 *
 * @throws FormatError if the first token is not '{', or (strict) if tokens follow the root
 * @throws UnexpectedEndOfInputError if a group is never closed
 * @throws NumberFormatError on a literal that does not parse
 */
export function buildTree(tokens: Iterable<Token>, options: ParseOptions = {}): Branch {
  const strict = options.strict ?? true;
  const iterator = tokens[Symbol.iterator]();

  const first = iterator.next();
  if (first.done || first.value.kind !== 'open') {
    throw new FormatError('missing opening brace');
  }

  const root = Branch(readGroup(iterator, 1).entries);

  if (strict) {
    const trailing = iterator.next();
    if (!trailing.done) {
      throw new FormatError(`unexpected content after closing brace at offset ${trailing.value.offset}`);
    }
  }
  return root;
}

/**
 * Tokenize and build a document in one step
 */
export function parseDocument(text: string, options: ParseOptions = {}): Branch {
  return buildTree(tokenize(text, options), options);
}

/**
 * Parse a document into a tree of the given variant, with its depth computed
 */
export function parseTree(text: string, variant: TreeVariant, options: ParseOptions = {}): Tree {
  return createTree(parseDocument(text, options), variant);
}

// ============================================================================
// Internals
// ============================================================================

/** Read entries up to the matching '}'; the opening brace is already consumed */
function readGroup(tokens: Iterator<Token, void>, openGroups: number): GroupContent {
  const entries: TreeNode[] = [];
  let values: number[] = [];
  let numbersOnly = true;

  const flush = () => {
    if (values.length > 0) {
      entries.push(Leaf(values));
      values = [];
    }
  };

  for (;;) {
    const next = tokens.next();
    if (next.done) throw new UnexpectedEndOfInputError(openGroups);

    const token = next.value;
    switch (token.kind) {
      case 'open':
        flush();
        entries.push(shapeGroup(readGroup(tokens, openGroups + 1)));
        numbersOnly = false;
        break;
      case 'close':
        flush();
        return { entries, numbersOnly };
      case 'number':
        values.push(parseNumber(token));
        break;
    }
  }
}

/** A number-only group with values is its single leaf; anything else is a branch */
function shapeGroup(group: GroupContent): TreeNode {
  if (group.numbersOnly && group.entries.length === 1) {
    return group.entries[0];
  }
  return Branch(group.entries);
}

function parseNumber(token: NumberToken): number {
  if (!NUMBER_LITERAL_PATTERN.test(token.literal)) {
    throw new NumberFormatError(token.literal, token.offset);
  }
  return Number(token.literal);
}
