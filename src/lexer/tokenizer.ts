/**
 * Tokenizer
 * Main tokenization logic
 */

import type { Token } from '../types.js';
import { TOKEN_TYPES } from '../types.js';
import { isDigit, isLetter, isWhitespace, newToken } from './helpers.js';
import { SINGLE_CHAR_OPERATORS, TWO_CHAR_OPERATORS } from './operators.js';
import { readIdentifier, readNumber } from './readers.js';
import {
  createLexerState,
  currentLocation,
  type LexerState,
  peekChar,
  readChar,
} from './state.js';

function skipWhitespace(state: LexerState): void {
  while (isWhitespace(state.ch)) {
    readChar(state);
  }
}

/**
 * Scan the next token and advance past it.
 *
 * Never throws: a character outside the language becomes an ILLEGAL token
 * and scanning continues after it. Once the input is exhausted every call
 * returns an EOF token with empty text.
 */
export function nextToken(state: LexerState): Token {
  skipWhitespace(state);
  const start = currentLocation(state);

  if (state.ch === '') {
    return newToken(TOKEN_TYPES.EOF, '', start, start);
  }

  // Number (positive only - unary minus handled by parser)
  if (isDigit(state.ch)) {
    return readNumber(state);
  }

  // Identifier or keyword
  if (isLetter(state.ch)) {
    return readIdentifier(state);
  }

  // == and != take the lookahead character too
  const pair = state.ch + peekChar(state);
  const pairType = TWO_CHAR_OPERATORS[pair];
  if (pairType) {
    readChar(state);
    readChar(state);
    return newToken(pairType, pair, start, currentLocation(state));
  }

  const ch = state.ch;
  const type = SINGLE_CHAR_OPERATORS[ch] ?? TOKEN_TYPES.ILLEGAL;
  readChar(state);
  return newToken(type, ch, start, currentLocation(state));
}

/** Scan a whole source text. The last token is always EOF. */
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
