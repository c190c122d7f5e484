/**
 * Kite Lexer Module
 * Exports the scanner, token types, and error types
 */

export {
  createLexerError,
  createLexerState,
  type IllegalCharacterEvent,
  type LexerState,
  LexerError,
  MAX_INT_LITERAL,
  nextToken,
  Scanner,
  type ScannerObservability,
  type ScannerOptions,
  tokenize,
} from './lexer/index.js';
export type { SourceLocation, SourceSpan } from './source-location.js';
export {
  type IntToken,
  isLexemeToken,
  lexeme,
  type LexemeToken,
  type LexemeTokenType,
  type SimpleToken,
  type SimpleTokenType,
  type Token,
  TOKEN_TYPES,
  type TokenType,
} from './token-types.js';
export {
  createError,
  KiteError,
  type KiteErrorData,
} from './error-classes.js';
export {
  ERROR_REGISTRY,
  renderMessage,
  type ErrorCategory,
  type ErrorDefinition,
  type ErrorExample,
  type ErrorRegistry,
} from './error-registry.js';
