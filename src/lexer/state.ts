/**
 * Lexer State
 * One-character cursor over the source text
 */

import type { SourceLocation } from '../types.js';

/**
 * `ch` is the character under examination and sits at `position`;
 * `readPosition` is where the character after it starts. A character is a
 * whole code point, so an astral character spans two UTF-16 units.
 * Once the input is exhausted `ch` is '' and the cursor stops moving.
 *
 * `line` and `column` locate `ch`. Columns count characters, offsets count
 * UTF-16 units.
 */
export interface LexerState {
  readonly source: string;
  position: number;
  readPosition: number;
  ch: string;
  line: number;
  column: number;
}

/** Code point starting at index, or '' past the end */
function charAt(source: string, index: number): string {
  const code = source.codePointAt(index);
  return code === undefined ? '' : String.fromCodePoint(code);
}

/** Create a cursor with the first character already loaded */
export function createLexerState(source: string): LexerState {
  const ch = charAt(source, 0);
  return {
    source,
    position: 0,
    readPosition: ch.length,
    ch,
    line: 1,
    column: 1,
  };
}

/** Move to the next character; a no-op at end of input */
export function readChar(state: LexerState): void {
  if (state.ch === '') return;

  if (state.ch === '\n') {
    state.line++;
    state.column = 1;
  } else {
    state.column++;
  }
  state.position = state.readPosition;
  state.ch = charAt(state.source, state.position);
  state.readPosition = state.position + state.ch.length;
}

/** Character after `ch`, without moving */
export function peekChar(state: LexerState): string {
  return charAt(state.source, state.readPosition);
}

export function currentLocation(state: LexerState): SourceLocation {
  return { line: state.line, column: state.column, offset: state.position };
}
