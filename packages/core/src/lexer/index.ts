/**
 * Tensor tree tokenizer
 *
 * Lexes scattering data text into braces and number literals. Whitespace and
 * commas separate tokens and produce none.
 */

import { MalformedNumberError } from '@tensortree/shared';

// ============================================================================
// Token Types
// ============================================================================

export interface OpenToken {
  readonly kind: 'open';
  readonly offset: number;
}

export interface CloseToken {
  readonly kind: 'close';
  readonly offset: number;
}

/** Number literal; parsed to float64 by the tree builder */
export interface NumberToken {
  readonly kind: 'number';
  readonly offset: number;
  readonly literal: string;
}

export type Token = OpenToken | CloseToken | NumberToken;

export interface TokenizeOptions {
  /** Raise on unrecognized characters (default) instead of skipping them */
  strict?: boolean;
}

// ============================================================================
// Patterns (in priority order)
// ============================================================================

const SEPARATOR_SOURCE = '[\\s,]+';
const NUMBER_SOURCE = '[-+]?(?:\\d+(?:\\.\\d*)?|\\.\\d+)(?:[eE][-+]?\\d+)?';

/** A complete number literal, as the tokenizer emits it */
export const NUMBER_LITERAL_PATTERN = new RegExp(`^${NUMBER_SOURCE}$`);

/** Longest run reported back in an unrecognized-input error */
const FRAGMENT_LENGTH = 12;

// ============================================================================
// Tokenizer
// ============================================================================

/**
 * Lazily tokenize tensor tree text.
 *
 * Each call owns its scanning state, so a fresh call re-tokenizes from the start
 * and concurrent iterations over the same text do not interfere.
 *
 * @throws MalformedNumberError in strict mode, at the first unrecognized character
 */
export function* tokenize(text: string, options: TokenizeOptions = {}): Generator<Token, void, undefined> {
  const strict = options.strict ?? true;
  const separator = new RegExp(SEPARATOR_SOURCE, 'y');
  const number = new RegExp(NUMBER_SOURCE, 'y');
  let offset = 0;

  while (offset < text.length) {
    separator.lastIndex = offset;
    if (separator.test(text)) {
      offset = separator.lastIndex;
      continue;
    }

    number.lastIndex = offset;
    const match = number.exec(text);
    if (match) {
      yield { kind: 'number', offset, literal: match[0] };
      offset = number.lastIndex;
      continue;
    }

    const char = text[offset];
    if (char === '{') {
      yield { kind: 'open', offset };
    } else if (char === '}') {
      yield { kind: 'close', offset };
    } else if (strict) {
      throw new MalformedNumberError(offset, unrecognizedFragment(text, offset));
    }
    offset++;
  }
}

/**
 * Literal form of a token
 */
export function tokenLiteral(token: Token): string {
  switch (token.kind) {
    case 'open':
      return '{';
    case 'close':
      return '}';
    case 'number':
      return token.literal;
  }
}

/** Text from offset up to the next separator or brace */
function unrecognizedFragment(text: string, offset: number): string {
  let end = offset + 1;
  while (end < text.length && end - offset < FRAGMENT_LENGTH && !/[\s,{}]/.test(text[end])) {
    end++;
  }
  return text.slice(offset, end);
}
