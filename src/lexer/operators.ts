/**
 * Operator Lookup Tables
 */

import type { SimpleTokenType } from '../token-types.js';
import { TOKEN_TYPES } from '../token-types.js';

/** Two-character operator lookup table */
export const TWO_CHAR_OPERATORS: ReadonlyMap<string, SimpleTokenType> =
  new Map([
    ['<=', TOKEN_TYPES.LTE],
    ['>=', TOKEN_TYPES.GTE],
    ['==', TOKEN_TYPES.EQ],
    ['!=', TOKEN_TYPES.NOT_EQ],
  ]);

/** Single-character operator lookup table */
export const SINGLE_CHAR_OPERATORS: ReadonlyMap<string, SimpleTokenType> =
  new Map([
    [',', TOKEN_TYPES.COMMA],
    [';', TOKEN_TYPES.SEMICOLON],
    ['(', TOKEN_TYPES.LPAREN],
    [')', TOKEN_TYPES.RPAREN],
    ['{', TOKEN_TYPES.LBRACE],
    ['}', TOKEN_TYPES.RBRACE],
    ['+', TOKEN_TYPES.PLUS],
    ['-', TOKEN_TYPES.MINUS],
    ['*', TOKEN_TYPES.ASTERISK],
    ['/', TOKEN_TYPES.SLASH],
    ['<', TOKEN_TYPES.LT],
    ['>', TOKEN_TYPES.GT],
    ['!', TOKEN_TYPES.BANG],
    ['=', TOKEN_TYPES.ASSIGN],
  ]);

/** Keyword lookup table */
export const KEYWORDS: ReadonlyMap<string, SimpleTokenType> = new Map([
  ['fn', TOKEN_TYPES.FUNCTION],
  ['let', TOKEN_TYPES.LET],
  ['true', TOKEN_TYPES.TRUE],
  ['false', TOKEN_TYPES.FALSE],
  ['if', TOKEN_TYPES.IF],
  ['else', TOKEN_TYPES.ELSE],
  ['return', TOKEN_TYPES.RETURN],
]);
