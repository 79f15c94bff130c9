/**
 * Token Readers
 * Functions to read specific token types from source
 */

import type { Token } from '../types.js';
import { ParseError, TOKEN_TYPES } from '../types.js';
import {
  isDigit,
  isIdentifierChar,
  isWhitespace,
  makeToken,
} from './helpers.js';
import {
  advance,
  currentLocation,
  isAtEnd,
  type LexerState,
  peek,
  peekString,
} from './state.js';

/** Skip whitespace, line comments and block comments */
export function skipTrivia(state: LexerState): void {
  while (!isAtEnd(state)) {
    if (isWhitespace(peek(state))) {
      advance(state);
    } else if (peekString(state, 2) === '//') {
      while (!isAtEnd(state) && peek(state) !== '\n') advance(state);
    } else if (peekString(state, 2) === '/*') {
      const start = currentLocation(state);
      advance(state);
      advance(state);
      while (peekString(state, 2) !== '*/') {
        if (isAtEnd(state)) throw new ParseError('COMP-P002', {}, start);
        advance(state);
      }
      advance(state);
      advance(state);
    } else {
      return;
    }
  }
}

/** Read a '...' or "..." literal. Escapes are kept verbatim. */
export function readString(state: LexerState): Token {
  const start = currentLocation(state);
  const quote = advance(state);

  while (peek(state) !== quote) {
    const ch = peek(state);
    if (isAtEnd(state) || ch === '\n' || ch === '\r') {
      throw new ParseError('COMP-P001', {}, start);
    }
    if (ch === '\\') advance(state); // escaped char, including a line break
    advance(state);
  }
  advance(state); // closing quote

  return makeToken(
    TOKEN_TYPES.STRING,
    state.source.slice(start.offset, state.pos),
    start,
    currentLocation(state)
  );
}

/**
 * Read template text starting after '`' or after the '}' that closes a
 * substitution. Stops after the closing '`' or after '${', in which case a
 * template frame is pushed so the matching '}' resumes the template.
 */
export function readTemplateChunk(
  state: LexerState,
  start = currentLocation(state)
): Token {
  for (;;) {
    if (isAtEnd(state)) throw new ParseError('COMP-P004', {}, start);
    const ch = advance(state);
    if (ch === '\\') {
      advance(state);
    } else if (ch === '`') {
      state.afterValue = true;
      break;
    } else if (ch === '$' && peek(state) === '{') {
      advance(state);
      state.braces.push('template');
      state.afterValue = false;
      break;
    }
  }

  return makeToken(
    TOKEN_TYPES.TEMPLATE,
    state.source.slice(start.offset, state.pos),
    start,
    currentLocation(state)
  );
}

export function readRegex(state: LexerState): Token {
  const start = currentLocation(state);
  advance(state); // consume opening /

  let inClass = false;
  for (;;) {
    const ch = peek(state);
    if (isAtEnd(state) || ch === '\n' || ch === '\r') {
      throw new ParseError('COMP-P003', {}, start);
    }
    advance(state);
    if (ch === '\\') {
      advance(state);
    } else if (ch === '[') {
      inClass = true;
    } else if (ch === ']') {
      inClass = false;
    } else if (ch === '/' && !inClass) {
      break;
    }
  }

  // flags
  while (!isAtEnd(state) && isIdentifierChar(peek(state))) advance(state);

  return makeToken(
    TOKEN_TYPES.REGEX,
    state.source.slice(start.offset, state.pos),
    start,
    currentLocation(state)
  );
}

/** Read a numeric literal, including exponents, radix prefixes and `n` */
export function readNumber(state: LexerState): Token {
  const start = currentLocation(state);
  let value = '';

  for (;;) {
    const ch = peek(state);
    const exponentSign =
      (ch === '+' || ch === '-') &&
      /^\d[\d_]*(\.[\d_]*)?[eE]$|^\.[\d_]+[eE]$/.test(value);
    if (isIdentifierChar(ch) || ch === '.' || exponentSign) {
      value += advance(state);
    } else {
      break;
    }
  }

  return makeToken(TOKEN_TYPES.NUMBER, value, start, currentLocation(state));
}

export function readIdentifier(state: LexerState): Token {
  const start = currentLocation(state);
  let value = '';

  while (!isAtEnd(state) && isIdentifierChar(peek(state))) {
    value += advance(state);
  }

  return makeToken(
    TOKEN_TYPES.IDENTIFIER,
    value,
    start,
    currentLocation(state)
  );
}

/** True when the next character begins a number (`.5` included) */
export function startsNumber(state: LexerState): boolean {
  const ch = peek(state);
  return isDigit(ch) || (ch === '.' && isDigit(peek(state, 1)));
}
