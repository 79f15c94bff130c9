/**
 * Comprehend Module
 * Exports scanner, parser, code generator, runtime, and types
 */

import { createComprehension } from './runtime/index.js';

export { findClosing, tokenize } from './lexer/index.js';
export { isFoldOperator, OUTPUT_ARITY, parse } from './parser/index.js';
export {
  FOLD_OPERATORS,
  type FoldOperator,
  generate,
} from './codegen/index.js';
export {
  assembleSource,
  build,
  type BuildEvent,
  buildComprehension,
  type CacheHitEvent,
  compile,
  type Comprehension,
  type ComprehensionFn,
  type ComprehensionOptions,
  createComprehension,
  type Environment,
  type ObservabilityCallbacks,
} from './runtime/index.js';
export type {
  ArrayClause,
  ClauseKind,
  FoldOperatorName,
  ForClause,
  ParseResult,
  RangeClause,
  SourceLocation,
  SourceSpan,
  Token,
  TokenType,
} from './types.js';

// ============================================================
// ERROR TAXONOMY
// ============================================================
export {
  CompileError,
  ComprehensionError,
  type ComprehensionErrorData,
  type ErrorCategory,
  type ErrorDefinition,
  ERROR_REGISTRY,
  ParseError,
  renderMessage,
} from './types.js';

// ============================================================
// DEFAULT CACHE
// ============================================================

/** Shared cache bound to globalThis */
export const comp = createComprehension();
