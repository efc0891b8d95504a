/**
 * Token Readers
 * Multi-character tokens, read as a slice of the source
 */

import type { Token } from '../types.js';
import { TOKEN_TYPES } from '../types.js';
import { isDigit, isLetter, newToken } from './helpers.js';
import { KEYWORDS } from './operators.js';
import { currentLocation, type LexerState, readChar } from './state.js';

/** Consume characters while the predicate holds and return the text */
function readWhile(state: LexerState, predicate: (ch: string) => boolean): string {
  const from = state.position;
  while (predicate(state.ch)) {
    readChar(state);
  }
  return state.source.slice(from, state.position);
}

/** Read a run of digits. Conversion to a number happens in the parser. */
export function readNumber(state: LexerState): Token {
  const start = currentLocation(state);
  const value = readWhile(state, isDigit);
  return newToken(TOKEN_TYPES.INT, value, start, currentLocation(state));
}

export function readIdentifier(state: LexerState): Token {
  const start = currentLocation(state);
  const value = readWhile(state, isLetter);
  const type = KEYWORDS.get(value) ?? TOKEN_TYPES.IDENT;
  return newToken(type, value, start, currentLocation(state));
}
