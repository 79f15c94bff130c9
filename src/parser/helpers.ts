/**
 * Parser Helpers
 * Fold operator names, name validation and placeholder scanning
 * @internal This module contains internal parser utilities
 */

import type { FoldOperatorName, Token } from '../types.js';
import { ParseError, TOKEN_TYPES } from '../types.js';

/** Names of generated temporaries start with this prefix */
export const RESERVED_PREFIX = '__';

// ============================================================
// FOLD OPERATORS
// ============================================================

/** Number of output expressions each fold operator folds per iteration */
export const OUTPUT_ARITY: Readonly<Record<FoldOperatorName, number>> = {
  list: 1,
  table: 2,
  sum: 1,
  min: 1,
  max: 1,
};

export function isFoldOperator(name: string): name is FoldOperatorName {
  return Object.hasOwn(OUTPUT_ARITY, name);
}

// ============================================================
// NAME VALIDATION
// ============================================================

/** Words JavaScript does not accept as a binding name */
const RESERVED_WORDS: ReadonlySet<string> = new Set([
  'await',
  'break',
  'case',
  'catch',
  'class',
  'const',
  'continue',
  'debugger',
  'default',
  'delete',
  'do',
  'else',
  'enum',
  'export',
  'extends',
  'false',
  'finally',
  'for',
  'function',
  'if',
  'import',
  'in',
  'instanceof',
  'let',
  'new',
  'null',
  'return',
  'super',
  'switch',
  'this',
  'throw',
  'true',
  'try',
  'typeof',
  'var',
  'void',
  'while',
  'with',
  'yield',
]);

/**
 * Reject names the generated code cannot bind.
 * @internal
 */
export function validateVariableName(token: Token): string {
  const name = token.value;
  if (name.startsWith(RESERVED_PREFIX)) {
    throw new ParseError(
      'COMP-P013',
      { name, prefix: RESERVED_PREFIX },
      token.span.start
    );
  }
  if (RESERVED_WORDS.has(name)) {
    throw new ParseError('COMP-P014', { name }, token.span.start);
  }
  return name;
}

// ============================================================
// PLACEHOLDERS
// ============================================================

const PLACEHOLDER = /^_(\d+)$/;

/**
 * Highest `_N` placeholder among identifier tokens. Strings, templates,
 * regular expressions and comments never yield identifier tokens, so their
 * contents are not counted.
 * @internal
 */
export function scanPlaceholders(tokens: readonly Token[]): number {
  let maxParam = 0;
  for (const token of tokens) {
    if (token.type !== TOKEN_TYPES.IDENTIFIER) continue;
    const match = PLACEHOLDER.exec(token.value);
    if (match?.[1] !== undefined) {
      maxParam = Math.max(maxParam, Number(match[1]));
    }
  }
  return maxParam;
}
