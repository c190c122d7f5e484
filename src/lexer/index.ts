/**
 * Lexer Module
 * Converts source text into tokens
 */

export { createLexerError, LexerError } from './errors.js';
export { MAX_INT_LITERAL } from './readers.js';
export {
  type IllegalCharacterEvent,
  Scanner,
  type ScannerObservability,
  type ScannerOptions,
} from './scanner.js';
export { createLexerState, type LexerState } from './state.js';
export { nextToken, tokenize } from './tokenizer.js';
