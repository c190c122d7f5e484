import type { SourceSpan } from './source-location.js';

// ============================================================
// TOKEN TYPES
// ============================================================

export const TOKEN_TYPES = {
  // Delimiters
  ASSIGN: 'ASSIGN', // =
  COMMA: 'COMMA', // ,
  SEMICOLON: 'SEMICOLON', // ;
  LPAREN: 'LPAREN', // (
  RPAREN: 'RPAREN', // )
  LBRACE: 'LBRACE', // {
  RBRACE: 'RBRACE', // }

  // Arithmetic operators
  PLUS: 'PLUS', // +
  MINUS: 'MINUS', // -
  ASTERISK: 'ASTERISK', // *
  SLASH: 'SLASH', // /

  // Comparison operators
  LT: 'LT', // <
  GT: 'GT', // >
  BANG: 'BANG', // !
  LTE: 'LTE', // <=
  GTE: 'GTE', // >=
  EQ: 'EQ', // ==
  NOT_EQ: 'NOT_EQ', // !=

  // Identifiers and literals
  IDENT: 'IDENT',
  INT: 'INT',

  // Keywords
  FUNCTION: 'FUNCTION', // fn
  LET: 'LET',
  TRUE: 'TRUE',
  FALSE: 'FALSE',
  IF: 'IF',
  ELSE: 'ELSE',
  RETURN: 'RETURN',

  // Special
  ILLEGAL: 'ILLEGAL',
  EOF: 'EOF',
} as const;

export type TokenType = (typeof TOKEN_TYPES)[keyof typeof TOKEN_TYPES];

/** Token types whose text lives in the source they were scanned from */
export type LexemeTokenType = typeof TOKEN_TYPES.IDENT | typeof TOKEN_TYPES.ILLEGAL;

/** Token types that carry nothing beyond their type and span */
export type SimpleTokenType = Exclude<
  TokenType,
  LexemeTokenType | typeof TOKEN_TYPES.INT
>;

// ============================================================
// TOKENS
// ============================================================

export interface SimpleToken {
  readonly type: SimpleTokenType;
  readonly span: SourceSpan;
}

/**
 * Token whose text is a view into the scanned source.
 *
 * The token keeps a reference to the whole input rather than a copy of
 * its text; `lexeme()` reads the characters between the span offsets.
 */
export interface LexemeToken {
  readonly type: LexemeTokenType;
  readonly span: SourceSpan;
  readonly source: string;
}

/** Integer literal, always within 0..2^63-1 */
export interface IntToken {
  readonly type: typeof TOKEN_TYPES.INT;
  readonly span: SourceSpan;
  readonly value: bigint;
}

export type Token = SimpleToken | LexemeToken | IntToken;

export function isLexemeToken(token: Token): token is LexemeToken {
  return (
    token.type === TOKEN_TYPES.IDENT || token.type === TOKEN_TYPES.ILLEGAL
  );
}

/** Text of an identifier or illegal character, sliced from its source */
export function lexeme(token: LexemeToken): string {
  return token.source.slice(token.span.start.offset, token.span.end.offset);
}
