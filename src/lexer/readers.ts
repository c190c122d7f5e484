/**
 * Token Readers
 * Functions to read multi-character tokens from source
 */

import type { IntToken, LexemeToken, SimpleToken } from '../token-types.js';
import { TOKEN_TYPES } from '../token-types.js';
import { createLexerError } from './errors.js';
import { isDigit, isWordChar, makeToken } from './helpers.js';
import { KEYWORDS } from './operators.js';
import {
  advance,
  currentLocation,
  isAtEnd,
  type LexerState,
  peek,
} from './state.js';

/** Largest value an integer literal may spell (2^63 - 1) */
export const MAX_INT_LITERAL = 9223372036854775807n;

/**
 * Read a keyword or identifier. The caller has checked that the current
 * character is a letter; underscores may continue the word but not start it.
 */
export function readWord(state: LexerState): SimpleToken | LexemeToken {
  const start = currentLocation(state);

  while (!isAtEnd(state) && isWordChar(peek(state))) {
    advance(state);
  }

  const end = currentLocation(state);
  const keyword = KEYWORDS.get(state.source.slice(start.offset, end.offset));
  if (keyword) {
    return makeToken(keyword, start, end);
  }

  return {
    type: TOKEN_TYPES.IDENT,
    span: { start, end },
    source: state.source,
  };
}

/**
 * Read a run of decimal digits as a 64-bit signed integer.
 *
 * @throws LexerError KITE-L001 when the value exceeds MAX_INT_LITERAL.
 * The cursor is already past the digits, so scanning can resume.
 */
export function readInteger(state: LexerState): IntToken {
  const start = currentLocation(state);

  while (!isAtEnd(state) && isDigit(peek(state))) {
    advance(state);
  }

  const end = currentLocation(state);
  const digits = state.source.slice(start.offset, end.offset);
  const value = BigInt(digits);

  if (value > MAX_INT_LITERAL) {
    throw createLexerError(
      'KITE-L001',
      { value: digits, max: MAX_INT_LITERAL },
      start
    );
  }

  return { type: TOKEN_TYPES.INT, span: { start, end }, value };
}
