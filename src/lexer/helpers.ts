/**
 * Lexer Helper Functions
 * Character classification and token construction
 */

import type { SourceLocation } from '../source-location.js';
import type { SimpleToken, SimpleTokenType } from '../token-types.js';
import { advance, currentLocation, type LexerState } from './state.js';

const ALPHABETIC = /^\p{Alphabetic}$/u;
const WHITE_SPACE = /^\p{White_Space}$/u;

export function isDigit(ch: string): boolean {
  return ch >= '0' && ch <= '9';
}

export function isLetter(ch: string): boolean {
  return ALPHABETIC.test(ch);
}

/** Characters that may continue a word once a letter has started it */
export function isWordChar(ch: string): boolean {
  return isLetter(ch) || ch === '_';
}

export function isWhitespace(ch: string): boolean {
  return WHITE_SPACE.test(ch);
}

export function makeToken(
  type: SimpleTokenType,
  start: SourceLocation,
  end: SourceLocation
): SimpleToken {
  return { type, span: { start, end } };
}

/** Advance n times and return a token */
export function advanceAndMakeToken(
  state: LexerState,
  n: number,
  type: SimpleTokenType,
  start: SourceLocation
): SimpleToken {
  for (let i = 0; i < n; i++) advance(state);
  return makeToken(type, start, currentLocation(state));
}
