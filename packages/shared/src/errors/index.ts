/**
 * Error taxonomy for tensor tree decoding
 *
 * Every failure is unrecoverable for the parse or lookup in progress; callers
 * decide whether to skip the data block or abort.
 */

/** Stable error codes, one per class */
export type TensorTreeErrorCode =
  | 'FORMAT'
  | 'MALFORMED_NUMBER'
  | 'NUMBER_FORMAT'
  | 'UNEXPECTED_END_OF_INPUT'
  | 'EMPTY_BRANCH'
  | 'STRUCTURAL_MISMATCH'
  | 'UNKNOWN_DIRECTION';

/** Base class of all decoding errors */
export class TensorTreeError extends Error {
  readonly code: TensorTreeErrorCode;

  constructor(code: TensorTreeErrorCode, message: string) {
    super(message);
    this.name = 'TensorTreeError';
    this.code = code;
  }
}

/** Malformed top-level structure */
export class FormatError extends TensorTreeError {
  constructor(message: string, code: TensorTreeErrorCode = 'FORMAT') {
    super(code, message);
    this.name = 'FormatError';
  }
}

/** Character sequence the tokenizer does not recognize */
export class MalformedNumberError extends FormatError {
  readonly offset: number;

  constructor(offset: number, fragment: string) {
    super(`offset ${offset}: unrecognized input '${fragment}'`, 'MALFORMED_NUMBER');
    this.name = 'MalformedNumberError';
    this.offset = offset;
  }
}

/** Number literal that does not parse as a float64 */
export class NumberFormatError extends FormatError {
  readonly literal: string;

  constructor(literal: string, offset: number) {
    super(`offset ${offset}: cannot parse number literal '${literal}'`, 'NUMBER_FORMAT');
    this.name = 'NumberFormatError';
    this.literal = literal;
  }
}

/** Token stream ended before a group was closed */
export class UnexpectedEndOfInputError extends TensorTreeError {
  readonly openGroups: number;

  constructor(openGroups: number) {
    super('UNEXPECTED_END_OF_INPUT', `unexpected end of input: ${openGroups} unclosed group(s)`);
    this.name = 'UnexpectedEndOfInputError';
    this.openGroups = openGroups;
  }
}

/** Branch without children, for which no depth exists */
export class EmptyBranchError extends TensorTreeError {
  constructor() {
    super('EMPTY_BRANCH', 'branch has no children');
    this.name = 'EmptyBranchError';
  }
}

/** Index table that the node's actual shape cannot satisfy */
export class StructuralMismatchError extends TensorTreeError {
  /** Slot count the table needs (highest selected index + 1) */
  readonly expected: number;
  readonly actual: number;
  readonly level: number;

  constructor(expected: number, actual: number, level: number) {
    super(
      'STRUCTURAL_MISMATCH',
      `level ${level}: index table needs ${expected} slots, node has ${actual}`
    );
    this.name = 'StructuralMismatchError';
    this.expected = expected;
    this.actual = actual;
    this.level = level;
  }
}

/** Lookup against a data direction that was never loaded */
export class UnknownDirectionError extends TensorTreeError {
  readonly direction: string;

  constructor(direction: string) {
    super('UNKNOWN_DIRECTION', `no data block loaded for direction '${direction}'`);
    this.name = 'UnknownDirectionError';
    this.direction = direction;
  }
}
