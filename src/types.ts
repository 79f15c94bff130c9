/**
 * Comprehension Types
 * Token types, parse result shapes, and re-exported error taxonomy
 */

import type { SourceSpan } from './source-location.js';

export type { SourceLocation, SourceSpan } from './source-location.js';
export {
  ERROR_REGISTRY,
  renderMessage,
  type ErrorCategory,
  type ErrorDefinition,
  type ErrorRegistry,
} from './error-registry.js';
export {
  ComprehensionError,
  CompileError,
  ParseError,
  type ComprehensionErrorData,
} from './error-classes.js';

// ============================================================
// TOKENS
// ============================================================

export const TOKEN_TYPES = {
  IDENTIFIER: 'IDENTIFIER',
  NUMBER: 'NUMBER',
  STRING: 'STRING',
  TEMPLATE: 'TEMPLATE',
  REGEX: 'REGEX',
  OPEN: 'OPEN',
  CLOSE: 'CLOSE',
  COMMA: 'COMMA',
  SEMICOLON: 'SEMICOLON',
  ASSIGN: 'ASSIGN',
  DOT: 'DOT',
  OPERATOR: 'OPERATOR',
  EOF: 'EOF',
} as const;

export type TokenType = (typeof TOKEN_TYPES)[keyof typeof TOKEN_TYPES];

export interface Token {
  readonly type: TokenType;
  /** Raw source text of the token */
  readonly value: string;
  readonly span: SourceSpan;
}

// ============================================================
// PARSE RESULT
// ============================================================

export type FoldOperatorName = 'list' | 'table' | 'sum' | 'min' | 'max';

/**
 * How a for clause iterates:
 * - array: implicit input collection, one element per iteration
 * - numeric: `for x = start, stop[, step]`
 * - iterator: `for a, b in iterable[, iterable...]`
 */
export type ClauseKind = 'array' | 'numeric' | 'iterator';

interface ForClauseBase {
  /** Variables bound by this clause, in source order */
  readonly vars: readonly string[];
}

export interface ArrayClause extends ForClauseBase {
  readonly kind: 'array';
}

export interface RangeClause extends ForClauseBase {
  readonly kind: 'numeric' | 'iterator';
  readonly rangeExprs: readonly string[];
}

export type ForClause = ArrayClause | RangeClause;

/** Structural parts of one comprehension expression */
export interface ParseResult {
  /** Output expressions joined with ', ' */
  readonly out: string;
  /** Output expressions, one entry per comma-separated expression */
  readonly outputs: readonly string[];
  /** For clauses in source order (first = outermost loop) */
  readonly forClauses: readonly ForClause[];
  /** If guards in source order */
  readonly predicates: readonly string[];
  readonly opName: FoldOperatorName;
  /** Highest `_N` placeholder referenced, 0 when none */
  readonly maxParam: number;
}
