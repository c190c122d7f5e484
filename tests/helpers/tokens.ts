/**
 * Test utilities for scanner tests
 */

import {
  lexeme,
  TOKEN_TYPES,
  tokenize,
  type SimpleTokenType,
  type Token,
  type TokenType,
} from '../../src/index.js';

/** Token reduced to what a test compares: type plus text or value */
export interface TokenShape {
  readonly type: TokenType;
  readonly text?: string;
  readonly value?: bigint;
}

export function shape(token: Token): TokenShape {
  switch (token.type) {
    case TOKEN_TYPES.IDENT:
    case TOKEN_TYPES.ILLEGAL:
      return { type: token.type, text: lexeme(token) };
    case TOKEN_TYPES.INT:
      return { type: token.type, value: token.value };
    default:
      return { type: token.type };
  }
}

/** Tokenize and reduce every token, EOF included */
export function scan(source: string): TokenShape[] {
  return tokenize(source).map(shape);
}

export const tok = (type: SimpleTokenType): TokenShape => ({ type });

export const ident = (text: string): TokenShape => ({
  type: TOKEN_TYPES.IDENT,
  text,
});

export const illegal = (text: string): TokenShape => ({
  type: TOKEN_TYPES.ILLEGAL,
  text,
});

export const int = (value: number | bigint): TokenShape => ({
  type: TOKEN_TYPES.INT,
  value: BigInt(value),
});
