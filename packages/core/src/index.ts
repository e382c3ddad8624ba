/**
 * @tensortree/core
 * Tokenizer, tree builder, tree model and schemas
 */

export * from './schema/index.js';
export * from './lexer/index.js';
export * from './tree/index.js';
export * from './parser/index.js';
