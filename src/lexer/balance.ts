/**
 * Bracket Balancing
 * Locates the end of a bracketed span in a token stream
 */

import type { Token } from '../types.js';
import { ParseError, TOKEN_TYPES } from '../types.js';

const CLOSING: Readonly<Record<string, string>> = {
  '(': ')',
  '[': ']',
  '{': '}',
};

/** True for template text ending in `${`, which opens a substitution */
function opensSubstitution(token: Token): boolean {
  return token.type === TOKEN_TYPES.TEMPLATE && token.value.endsWith('${');
}

/** True for tokens whose matching closer `findClosing` should look for */
export function opensSpan(token: Token): boolean {
  return token.type === TOKEN_TYPES.OPEN || opensSubstitution(token);
}

function openText(token: Token): string {
  return token.type === TOKEN_TYPES.TEMPLATE ? '${' : token.value;
}

/** The bracket a token closes, or null. Template text after `}` closes `${`. */
function closingText(token: Token): string | null {
  if (token.type === TOKEN_TYPES.CLOSE) return token.value;
  if (token.type === TOKEN_TYPES.TEMPLATE && token.value.startsWith('}')) {
    return '}';
  }
  return null;
}

/**
 * Find the index of the token closing the bracket or `${` substitution
 * opened at `openIndex`. Nested spans must match pairwise; for a template
 * the closer is the chunk that ends the template.
 *
 * @throws ParseError COMP-P006 on a mismatched closing bracket,
 * COMP-P005 when the input ends before the bracket closes
 */
export function findClosing(
  tokens: readonly Token[],
  openIndex: number
): number {
  const stack: Token[] = [];

  for (let i = openIndex; i < tokens.length; i++) {
    const token = tokens[i];
    if (!token || token.type === TOKEN_TYPES.EOF) break;

    const found = closingText(token);
    if (found !== null) {
      const open = stack.pop();
      if (!open) break;
      const expected = opensSubstitution(open)
        ? '}'
        : (CLOSING[open.value] ?? '');
      if (found !== expected) {
        throw new ParseError(
          'COMP-P006',
          { expected, open: openText(open), found },
          token.span.start
        );
      }
    }

    // A middle template chunk closes one substitution and opens the next
    if (opensSpan(token)) {
      stack.push(token);
    } else if (found !== null && stack.length === 0) {
      return i;
    }
  }

  const unclosed = stack[stack.length - 1] ?? tokens[openIndex];
  if (!unclosed) {
    throw new RangeError(`No token at index ${openIndex}`);
  }
  throw new ParseError(
    'COMP-P005',
    { bracket: openText(unclosed) },
    unclosed.span.start
  );
}
