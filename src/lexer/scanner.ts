/**
 * Scanner
 * Pull-based token stream over one source string
 */

import type { SourceLocation } from '../source-location.js';
import { lexeme, TOKEN_TYPES, type Token } from '../token-types.js';
import {
  createLexerState,
  currentLocation,
  type LexerState,
} from './state.js';
import { nextToken } from './tokenizer.js';

/** Event emitted when a character outside the language is scanned */
export interface IllegalCharacterEvent {
  readonly char: string;
  readonly location: SourceLocation;
}

/** Callbacks for monitoring a scan */
export interface ScannerObservability {
  /** Called with every token returned, EOF included */
  onToken?: ((token: Token) => void) | undefined;
  /** Called for every ILLEGAL token */
  onIllegal?: ((event: IllegalCharacterEvent) => void) | undefined;
}

export interface ScannerOptions {
  observability?: ScannerObservability | undefined;
}

/**
 * Stateful scanner. Each `nextToken()` call returns exactly one token;
 * after the input is exhausted it keeps returning EOF.
 *
 * Iterating a scanner yields the remaining tokens up to and including
 * the first EOF.
 *
 * @example
 * const scanner = new Scanner('let five = 5;');
 * scanner.nextToken(); // { type: 'LET', ... }
 */
export class Scanner implements Iterable<Token> {
  private readonly state: LexerState;
  private readonly observability: ScannerObservability;

  constructor(source: string, options: ScannerOptions = {}) {
    this.state = createLexerState(source);
    this.observability = options.observability ?? {};
  }

  get source(): string {
    return this.state.source;
  }

  /** Location of the cursor */
  get location(): SourceLocation {
    return currentLocation(this.state);
  }

  /**
   * @throws LexerError KITE-L001 for an integer literal above 2^63 - 1
   */
  nextToken(): Token {
    const token = nextToken(this.state);

    if (token.type === TOKEN_TYPES.ILLEGAL) {
      this.observability.onIllegal?.({
        char: lexeme(token),
        location: token.span.start,
      });
    }
    this.observability.onToken?.(token);

    return token;
  }

  *[Symbol.iterator](): Iterator<Token> {
    let token: Token;
    do {
      token = this.nextToken();
      yield token;
    } while (token.type !== TOKEN_TYPES.EOF);
  }
}
