/**
 * Parser State
 * Core state management and token navigation utilities
 */

import type { Token } from '../types.js';
import { TOKEN_TYPES } from '../types.js';

// ============================================================
// PARSER STATE
// ============================================================

export interface ParserState {
  readonly tokens: readonly Token[];
  /** Original comprehension text, sliced to recover expression text */
  readonly source: string;
  pos: number;
  /**
   * Index of the token that ends the parse window: EOF, or the `)`
   * closing a fold operator call.
   */
  end: number;
}

export function createParserState(
  tokens: readonly Token[],
  source: string
): ParserState {
  return {
    tokens,
    source,
    pos: 0,
    end: tokens.length - 1,
  };
}

// ============================================================
// TOKEN NAVIGATION
// ============================================================

/** @internal */
export function current(state: ParserState): Token {
  const token = state.tokens[Math.min(state.pos, state.end)];
  if (token) return token;
  throw new Error('No tokens available');
}

/** @internal */
export function previous(state: ParserState): Token | undefined {
  return state.tokens[state.pos - 1];
}

/** @internal */
export function isAtEnd(state: ParserState): boolean {
  return state.pos >= state.end;
}

/** @internal */
export function check(state: ParserState, ...types: string[]): boolean {
  return !isAtEnd(state) && types.includes(current(state).type);
}

/** @internal */
export function advance(state: ParserState): Token {
  const token = current(state);
  if (!isAtEnd(state)) state.pos++;
  return token;
}

/**
 * Check for an identifier used as a clause keyword. `obj.for` and
 * `obj?.if` are property names, not keywords.
 * @internal
 */
export function checkKeyword(state: ParserState, keyword: string): boolean {
  if (!check(state, TOKEN_TYPES.IDENTIFIER)) return false;
  if (current(state).value !== keyword) return false;
  return previous(state)?.type !== TOKEN_TYPES.DOT;
}

/**
 * Source text from the start of token `from` to the end of token `to`.
 * @internal
 */
export function sliceTokens(
  state: ParserState,
  from: number,
  to: number
): string {
  const first = state.tokens[from];
  const last = state.tokens[to];
  if (!first || !last) return '';
  return state.source.slice(first.span.start.offset, last.span.end.offset);
}
