/**
 * Comprehension Parser
 * Main entry point and re-exports
 */

import { tokenize } from '../lexer/index.js';
import type { ParseResult } from '../types.js';
import { Parser } from './parser.js';

// ============================================================
// MAIN ENTRY POINT
// ============================================================

/**
 * Parse a comprehension into its structural parts.
 *
 * @throws ParseError describing the violated rule, located at the offending
 * token
 *
 * @example
 * ```typescript
 * const result = parse('sum(x ** 2 for x if x % 2 === 0)');
 * // result.opName === 'sum', result.predicates[0] === 'x % 2 === 0'
 * ```
 */
export function parse(source: string): ParseResult {
  const parser = new Parser(tokenize(source), source);
  return parser.parse();
}

// ============================================================
// RE-EXPORTS
// ============================================================

export {
  isFoldOperator,
  OUTPUT_ARITY,
  RESERVED_PREFIX,
} from './helpers.js';
export { createParserState, type ParserState } from './state.js';
export { Parser } from './parser.js';
