/**
 * Comprehension Lexer
 * Main entry point and re-exports
 */

export { findClosing, opensSpan } from './balance.js';
export { createLexerState, type LexerState } from './state.js';
export { nextToken, tokenize } from './tokenizer.js';
