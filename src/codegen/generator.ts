/**
 * Code Generator
 *
 * Turns a ParseResult into the body of a JavaScript procedure:
 *
 *   let __result = <init>;
 *   for (...first clause...) {
 *     for (...last clause...) {
 *       if (<pred 1>) { if (<pred 2>) { <accum> } }
 *     }
 *   }
 *
 * Each wrap surrounds the code built so far, so predicates and clauses are
 * wrapped in reverse source order to come out in source order.
 */

import type { ForClause, ParseResult } from '../types.js';
import {
  lookupOperator,
  OUT_SLOT,
  RESULT_VAR,
  RUNTIME_VAR,
} from './operators.js';

const INDENT = '  ';

/** Name of the implicit input read by array clause `id` (1-based) */
export function inputName(id: number): string {
  return `__in${id}`;
}

function indent(lines: readonly string[]): string[] {
  return lines.map((line) => INDENT + line);
}

function bindingPattern(vars: readonly string[]): string {
  return vars.length === 1 ? (vars[0] ?? '') : `[${vars.join(', ')}]`;
}

/** Wrap `body` in the loop of one for clause */
function wrapClause(clause: ForClause, id: number, body: string[]): string[] {
  const target = bindingPattern(clause.vars);

  if (clause.kind === 'array') {
    const input = inputName(id);
    const idx = `__idx${id}`;
    return [
      `for (let ${idx} = 0; ${idx} < ${input}.length; ${idx}++) {`,
      `${INDENT}let ${target} = ${input}[${idx}];`,
      ...indent(body),
      '}',
    ];
  }

  if (clause.kind === 'numeric') {
    const [from = '', to = '', step = '1'] = clause.rangeExprs;
    const start = `__start${id}`;
    const stop = `__stop${id}`;
    const inc = `__step${id}`;
    return [
      '{',
      `${INDENT}const ${start} = (${from}), ${stop} = (${to}), ${inc} = (${step});`,
      `${INDENT}${RUNTIME_VAR}.checkRange(${start}, ${stop}, ${inc});`,
      `${INDENT}for (let ${target} = ${start}; ${inc} > 0 ? ${target} <= ${stop} : ${target} >= ${stop}; ${target} += ${inc}) {`,
      ...indent(indent(body)),
      `${INDENT}}`,
      '}',
    ];
  }

  if (clause.rangeExprs.length === 1) {
    return [
      `for (let ${target} of (${clause.rangeExprs[0] ?? ''})) {`,
      ...indent(body),
      '}',
    ];
  }

  // Several iterables are walked one after another
  const source = `__iter${id}`;
  return [
    `for (const ${source} of [${clause.rangeExprs.join(', ')}]) {`,
    `${INDENT}for (let ${target} of ${source}) {`,
    ...indent(indent(body)),
    `${INDENT}}`,
    '}',
  ];
}

/**
 * Generate the procedure body for a parsed comprehension. The result is
 * left in `__result`; the builder adds the parameter preamble and return.
 */
export function generate(result: ParseResult): string {
  const operator = lookupOperator(result.opName);

  // A replacer function keeps `$&`-style sequences in `out` literal
  let code = [operator.accum.replace(OUT_SLOT, () => result.out)];

  for (const predicate of [...result.predicates].reverse()) {
    code = [`if (${predicate}) {`, ...indent(code), '}'];
  }

  const clauses = result.forClauses.map((clause, index) => ({
    clause,
    id: index + 1,
  }));
  for (const { clause, id } of clauses.reverse()) {
    code = wrapClause(clause, id, code);
  }

  return [`let ${RESULT_VAR} = ${operator.init};`, ...code].join('\n');
}
