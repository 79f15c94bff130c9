/**
 * Tokenizer
 * Splits comprehension text into tokens. Whitespace and comments produce
 * no token, so keywords inside strings, templates, regular expressions and
 * comments are never seen as identifiers.
 */

import type { Token } from '../types.js';
import { ParseError, TOKEN_TYPES } from '../types.js';
import {
  advanceAndMakeToken,
  isDigit,
  isIdentifierStart,
  makeToken,
} from './helpers.js';
import { MULTI_CHAR_OPERATORS, OPERAND_KEYWORDS } from './operators.js';
import {
  readIdentifier,
  readNumber,
  readRegex,
  readString,
  readTemplateChunk,
  skipTrivia,
  startsNumber,
} from './readers.js';
import {
  advance,
  createLexerState,
  currentLocation,
  isAtEnd,
  type LexerState,
  peek,
  peekString,
} from './state.js';

function readPunctuator(state: LexerState): Token {
  const start = currentLocation(state);
  const ch = peek(state);

  switch (ch) {
    case '(':
    case '[':
      return advanceAndMakeToken(state, 1, TOKEN_TYPES.OPEN, start);
    case '{':
      state.braces.push('brace');
      return advanceAndMakeToken(state, 1, TOKEN_TYPES.OPEN, start);
    case ')':
    case ']':
      return advanceAndMakeToken(state, 1, TOKEN_TYPES.CLOSE, start);
    case '}':
      if (state.braces[state.braces.length - 1] === 'template') {
        state.braces.pop();
        advance(state);
        return readTemplateChunk(state, start);
      }
      state.braces.pop();
      return advanceAndMakeToken(state, 1, TOKEN_TYPES.CLOSE, start);
    case ',':
      return advanceAndMakeToken(state, 1, TOKEN_TYPES.COMMA, start);
    case ';':
      return advanceAndMakeToken(state, 1, TOKEN_TYPES.SEMICOLON, start);
  }

  // Optional chaining is property access; `a?.5:1` is a conditional
  if (peekString(state, 2) === '?.' && !isDigit(peek(state, 2))) {
    return advanceAndMakeToken(state, 2, TOKEN_TYPES.DOT, start);
  }

  for (const op of MULTI_CHAR_OPERATORS) {
    if (peekString(state, op.length) === op) {
      const type = TOKEN_TYPES.OPERATOR;
      return advanceAndMakeToken(state, op.length, type, start);
    }
  }

  if (ch === '.') {
    return advanceAndMakeToken(state, 1, TOKEN_TYPES.DOT, start);
  }
  if (ch === '=') {
    return advanceAndMakeToken(state, 1, TOKEN_TYPES.ASSIGN, start);
  }
  return advanceAndMakeToken(state, 1, TOKEN_TYPES.OPERATOR, start);
}

export function nextToken(state: LexerState): Token {
  skipTrivia(state);

  if (isAtEnd(state)) {
    if (state.braces.includes('template')) {
      throw new ParseError('COMP-P004', {}, currentLocation(state));
    }
    const loc = currentLocation(state);
    return makeToken(TOKEN_TYPES.EOF, '', loc, loc);
  }

  const ch = peek(state);
  let token: Token;

  if (ch === '"' || ch === "'") {
    token = readString(state);
  } else if (ch === '`') {
    const start = currentLocation(state);
    advance(state);
    // readTemplateChunk decides afterValue itself
    return readTemplateChunk(state, start);
  } else if (startsNumber(state)) {
    token = readNumber(state);
  } else if (isIdentifierStart(ch)) {
    token = readIdentifier(state);
  } else if (ch === '/' && !state.afterValue) {
    token = readRegex(state);
  } else {
    token = readPunctuator(state);
    if (token.type === TOKEN_TYPES.TEMPLATE) return token;
  }

  state.afterValue = endsOperand(token);
  return token;
}

function endsOperand(token: Token): boolean {
  switch (token.type) {
    case TOKEN_TYPES.IDENTIFIER:
      return !OPERAND_KEYWORDS.has(token.value);
    case TOKEN_TYPES.NUMBER:
    case TOKEN_TYPES.STRING:
    case TOKEN_TYPES.REGEX:
    case TOKEN_TYPES.CLOSE:
      return true;
    case TOKEN_TYPES.OPERATOR:
      return token.value === '++' || token.value === '--';
    default:
      return false;
  }
}

/**
 * Tokenize comprehension text. The final token is always EOF.
 *
 * @throws ParseError on unterminated strings, templates, regular expressions
 * or block comments
 */
export function tokenize(source: string): Token[] {
  const state = createLexerState(source);
  const tokens: Token[] = [];
  let token: Token;

  do {
    token = nextToken(state);
    tokens.push(token);
  } while (token.type !== TOKEN_TYPES.EOF);

  return tokens;
}
