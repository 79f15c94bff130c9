/**
 * Comprehension Parser
 *
 * Splits a comprehension into its structural parts:
 *
 *   [opname '('] outlist ('for' namelist [('=' | 'in') explist])+ ('if' expr)* [')']
 *
 * Output, range and predicate expressions stay opaque: each is the source
 * text between its first and last token, with brackets balanced.
 */

import { findClosing, opensSpan } from '../lexer/index.js';
import type {
  FoldOperatorName,
  ForClause,
  ParseResult,
  Token,
} from '../types.js';
import { ParseError, TOKEN_TYPES } from '../types.js';
import {
  isFoldOperator,
  OUTPUT_ARITY,
  scanPlaceholders,
  validateVariableName,
} from './helpers.js';
import {
  advance,
  check,
  checkKeyword,
  createParserState,
  current,
  isAtEnd,
  type ParserState,
  sliceTokens,
} from './state.js';

/**
 * Parser over the token stream of one comprehension.
 *
 * @example
 * ```typescript
 * const parser = new Parser(tokenize(source), source);
 * const result = parser.parse();
 * ```
 */
export class Parser {
  state: ParserState;

  constructor(tokens: readonly Token[], source: string) {
    this.state = createParserState(tokens, source);
  }

  parse(): ParseResult {
    const opName = this.parseFoldOperator();

    const outputStart = current(this.state);
    const outputs = this.parseExpressionList('output expression');
    this.checkOutputArity(opName, outputs, outputStart);

    const forClauses: ForClause[] = [];
    while (checkKeyword(this.state, 'for')) {
      forClauses.push(this.parseForClause(advance(this.state)));
    }
    if (forClauses.length === 0) {
      throw new ParseError('COMP-P011', {}, current(this.state).span.start);
    }

    const predicates: string[] = [];
    while (checkKeyword(this.state, 'if')) {
      advance(this.state);
      const predicate = this.parseExpression();
      if (predicate === null) {
        throw new ParseError(
          'COMP-P010',
          { what: 'predicate expression' },
          current(this.state).span.start
        );
      }
      predicates.push(predicate);
    }

    const maxParam = scanPlaceholders(this.state.tokens);

    if (!isAtEnd(this.state)) {
      const token = current(this.state);
      throw new ParseError(
        'COMP-P019',
        { remainder: this.state.source.slice(token.span.start.offset) },
        token.span.start
      );
    }

    return Object.freeze({
      out: outputs.join(', '),
      outputs: Object.freeze(outputs),
      forClauses: Object.freeze(forClauses),
      predicates: Object.freeze(predicates),
      opName,
      maxParam,
    });
  }

  /**
   * Detect `name( ... )` spanning the whole input. Only then is `name` a
   * fold operator and the window narrowed to the parenthesized interior;
   * `f(x) + 1 for x` starts with an ordinary call.
   */
  private parseFoldOperator(): FoldOperatorName {
    const { tokens } = this.state;
    const name = tokens[0];
    const open = tokens[1];
    if (
      name?.type !== TOKEN_TYPES.IDENTIFIER ||
      open?.type !== TOKEN_TYPES.OPEN ||
      open.value !== '('
    ) {
      return 'list';
    }

    const close = findClosing(tokens, 1);
    if (tokens[close + 1]?.type !== TOKEN_TYPES.EOF) {
      return 'list';
    }

    if (!isFoldOperator(name.value)) {
      throw new ParseError('COMP-P017', { name: name.value }, name.span.start);
    }
    this.state.pos = 2;
    this.state.end = close;
    return name.value;
  }

  private checkOutputArity(
    opName: FoldOperatorName,
    outputs: readonly string[],
    at: Token
  ): void {
    const expected = OUTPUT_ARITY[opName];
    if (outputs.length === expected) return;

    throw new ParseError(
      'COMP-P018',
      {
        operator: opName,
        expected,
        plural: expected === 1 ? '' : 's',
        count: outputs.length,
      },
      at.span.start
    );
  }

  private parseForClause(keyword: Token): ForClause {
    const vars = this.parseNameList();

    if (check(this.state, TOKEN_TYPES.ASSIGN)) {
      const assign = advance(this.state);
      const rangeExprs = this.parseExpressionList('range expression');
      if (rangeExprs.length !== 2 && rangeExprs.length !== 3) {
        throw new ParseError(
          'COMP-P015',
          { count: rangeExprs.length },
          assign.span.start
        );
      }
      this.checkSingleVariable('Numeric', vars, keyword);
      return { kind: 'numeric', vars, rangeExprs: Object.freeze(rangeExprs) };
    }

    if (checkKeyword(this.state, 'in')) {
      advance(this.state);
      const rangeExprs = this.parseExpressionList('iterator expression');
      return { kind: 'iterator', vars, rangeExprs: Object.freeze(rangeExprs) };
    }

    this.checkSingleVariable('Array', vars, keyword);
    return { kind: 'array', vars };
  }

  private checkSingleVariable(
    kind: string,
    vars: readonly string[],
    at: Token
  ): void {
    if (vars.length !== 1) {
      throw new ParseError(
        'COMP-P016',
        { kind, count: vars.length },
        at.span.start
      );
    }
  }

  private parseNameList(): readonly string[] {
    const names: string[] = [];
    let keyword = 'for';

    for (;;) {
      if (!check(this.state, TOKEN_TYPES.IDENTIFIER)) {
        throw new ParseError(
          'COMP-P012',
          { keyword },
          current(this.state).span.start
        );
      }
      names.push(validateVariableName(advance(this.state)));

      if (!check(this.state, TOKEN_TYPES.COMMA)) break;
      advance(this.state);
      keyword = ',';
    }

    return Object.freeze(names);
  }

  /** Comma-separated expressions; at least one, none empty */
  private parseExpressionList(what: string): string[] {
    const list: string[] = [];

    for (;;) {
      const expr = this.parseExpression();
      if (expr === null) {
        throw new ParseError(
          'COMP-P010',
          { what: list.length === 0 ? what : `${what} after ','` },
          current(this.state).span.start
        );
      }
      list.push(expr);

      if (!check(this.state, TOKEN_TYPES.COMMA)) return list;
      advance(this.state);
    }
  }

  /**
   * One expression, ending at a top-level `,` `;` closing bracket, clause
   * keyword, or the end of the window. Brackets and `${}` substitutions are
   * skipped whole. Returns null when empty.
   */
  private parseExpression(): string | null {
    const { state } = this;
    const start = state.pos;

    while (!isAtEnd(state)) {
      if (check(state, TOKEN_TYPES.COMMA, TOKEN_TYPES.SEMICOLON)) break;
      if (check(state, TOKEN_TYPES.CLOSE)) break;
      if (checkKeyword(state, 'for') || checkKeyword(state, 'if')) break;

      if (opensSpan(current(state))) {
        state.pos = findClosing(state.tokens, state.pos) + 1;
      } else {
        advance(state);
      }
    }

    if (state.pos === start) return null;
    return sliceTokens(state, start, state.pos - 1);
  }
}
