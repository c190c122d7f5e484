/**
 * Tokenizer
 * Main tokenization logic
 */

import type { Token } from '../token-types.js';
import { TOKEN_TYPES } from '../token-types.js';
import {
  advanceAndMakeToken,
  isDigit,
  isLetter,
  isWhitespace,
  makeToken,
} from './helpers.js';
import { SINGLE_CHAR_OPERATORS, TWO_CHAR_OPERATORS } from './operators.js';
import { readInteger, readWord } from './readers.js';
import {
  advance,
  createLexerState,
  currentLocation,
  isAtEnd,
  type LexerState,
  peek,
  peekString,
} from './state.js';

function skipWhitespace(state: LexerState): void {
  while (!isAtEnd(state) && isWhitespace(peek(state))) {
    advance(state);
  }
}

/**
 * Scan one token and move the cursor past it.
 *
 * Once the input is exhausted every call returns EOF without moving.
 */
export function nextToken(state: LexerState): Token {
  skipWhitespace(state);

  if (isAtEnd(state)) {
    const loc = currentLocation(state);
    return makeToken(TOKEN_TYPES.EOF, loc, loc);
  }

  const start = currentLocation(state);
  const ch = peek(state);

  // Two-character operators (lookup table)
  const twoCharType = TWO_CHAR_OPERATORS.get(peekString(state, 2));
  if (twoCharType) {
    return advanceAndMakeToken(state, 2, twoCharType, start);
  }

  // Single-character operators (lookup table)
  const singleCharType = SINGLE_CHAR_OPERATORS.get(ch);
  if (singleCharType) {
    return advanceAndMakeToken(state, 1, singleCharType, start);
  }

  // Identifier or keyword
  if (isLetter(ch)) {
    return readWord(state);
  }

  // Integer (non-negative only - minus is its own token)
  if (isDigit(ch)) {
    return readInteger(state);
  }

  advance(state);
  return {
    type: TOKEN_TYPES.ILLEGAL,
    span: { start, end: currentLocation(state) },
    source: state.source,
  };
}

/** Scan the whole source; the last token is always EOF */
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
