/**
 * Lexer State
 * Tracks position in source text during tokenization
 *
 * Positions step over whole code points: a surrogate pair is one
 * character and one column. Offsets stay UTF-16 indexes so they can
 * slice the source directly.
 */

import type { SourceLocation } from '../source-location.js';

export interface LexerState {
  readonly source: string;
  pos: number;
  line: number;
  column: number;
}

export function createLexerState(source: string): LexerState {
  return {
    source,
    pos: 0,
    line: 1,
    column: 1,
  };
}

export function currentLocation(state: LexerState): SourceLocation {
  return { line: state.line, column: state.column, offset: state.pos };
}

function charAt(source: string, index: number): string {
  const codePoint = source.codePointAt(index);
  return codePoint === undefined ? '' : String.fromCodePoint(codePoint);
}

/** Character `offset` characters ahead of the cursor, or '' past the end */
export function peek(state: LexerState, offset = 0): string {
  let index = state.pos;
  for (let i = 0; i < offset; i++) {
    const ch = charAt(state.source, index);
    if (ch === '') return '';
    index += ch.length;
  }
  return charAt(state.source, index);
}

export function peekString(state: LexerState, length: number): string {
  return state.source.slice(state.pos, state.pos + length);
}

/** Consume one character. At the end of input this is a no-op returning '' */
export function advance(state: LexerState): string {
  const ch = charAt(state.source, state.pos);
  if (ch === '') return ch;

  state.pos += ch.length;
  if (ch === '\n') {
    state.line++;
    state.column = 1;
  } else {
    state.column++;
  }
  return ch;
}

export function isAtEnd(state: LexerState): boolean {
  return state.pos >= state.source.length;
}
