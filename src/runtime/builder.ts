/**
 * Procedure Builder
 *
 * Wraps generated code in a parameter preamble and return statement, then
 * compiles it with the Function constructor. The compiled body runs inside
 * `with (__scope)` so free identifiers resolve against the caller's
 * environment.
 */

import {
  generate,
  inputName,
  RESULT_VAR,
  RUNTIME_VAR,
} from '../codegen/index.js';
import { parse } from '../parser/index.js';
import { CompileError } from '../types.js';
import type { ForClause } from '../types.js';
import { RUNTIME_INTRINSICS } from './intrinsics.js';
import { createScope } from './scope.js';
import type {
  ComprehensionFn,
  Environment,
  ObservabilityCallbacks,
} from './types.js';

const SCOPE_VAR = '__scope';
const ARGS_VAR = '__args';
const PARAMETERS = [SCOPE_VAR, RUNTIME_VAR, ARGS_VAR] as const;

/**
 * Positional parameter names: `_1 … _maxParam`, then the implicit input of
 * each array clause in clause order.
 */
export function parameterNames(
  maxParam: number,
  clauses: readonly ForClause[]
): string[] {
  const names: string[] = [];
  for (let n = 1; n <= maxParam; n++) {
    names.push(`_${n}`);
  }
  clauses.forEach((clause, index) => {
    if (clause.kind === 'array') names.push(inputName(index + 1));
  });
  return names;
}

/**
 * Full procedure source: argument destructuring, generated loops, return.
 * `clauseCount` bounds how many of `clauses` are considered.
 */
export function assembleSource(
  code: string,
  clauseCount: number,
  maxParam: number,
  clauses: readonly ForClause[]
): string {
  const names = parameterNames(maxParam, clauses.slice(0, clauseCount));
  const lines: string[] = [];
  if (names.length > 0) {
    lines.push(`let [${names.join(', ')}] = ${ARGS_VAR};`);
  }
  lines.push(code, `return ${RESULT_VAR};`);

  // Not re-indented: template literals in embedded expressions span lines
  return [`with (${SCOPE_VAR}) {`, ...lines, '}'].join('\n');
}

/**
 * Compile assembled source and bind it to `environment`.
 *
 * @throws CompileError when the JavaScript compiler rejects the source
 */
export function compile(
  source: string,
  environment: Environment
): ComprehensionFn {
  let procedure: Function;
  try {
    procedure = new Function(...PARAMETERS, source);
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new CompileError(error.message, source);
    }
    throw error;
  }

  const scope = createScope(environment, PARAMETERS);
  return (...args: unknown[]): unknown =>
    Reflect.apply(procedure, undefined, [scope, RUNTIME_INTRINSICS, args]);
}

/**
 * Turn generated code into a callable bound to `environment`.
 *
 * @throws CompileError when the generated code does not compile
 */
export function build(
  code: string,
  clauseCount: number,
  maxParam: number,
  clauses: readonly ForClause[],
  environment: Environment
): ComprehensionFn {
  return compile(
    assembleSource(code, clauseCount, maxParam, clauses),
    environment
  );
}

/**
 * Parse, generate and build one comprehension, uncached.
 *
 * @throws ParseError for malformed comprehension text
 * @throws CompileError when the generated code does not compile
 *
 * @example
 * ```typescript
 * const squares = buildComprehension('x * x for x');
 * squares([1, 2, 3]); // [1, 4, 9]
 * ```
 */
export function buildComprehension(
  expression: string,
  environment: Environment = globalThis,
  observability: ObservabilityCallbacks = {}
): ComprehensionFn {
  const startTime = performance.now();

  const result = parse(expression);
  const code = generate(result);
  const source = assembleSource(
    code,
    result.forClauses.length,
    result.maxParam,
    result.forClauses
  );
  const fn = compile(source, environment);

  observability.onBuild?.({
    expression,
    opName: result.opName,
    source,
    durationMs: performance.now() - startTime,
  });

  return fn;
}
