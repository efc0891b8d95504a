/**
 * Sprig Lexer Tests
 * Token types, literal text, spans and EOF behaviour
 */

import { describe, expect, it } from 'vitest';
import {
  createLexerState,
  KEYWORDS,
  nextToken,
  tokenize,
} from '../../src/index.js';
import { peekChar, readChar } from '../../src/lexer/state.js';
import type { Token } from '../../src/types.js';

/** [type, value] pairs for every token, EOF included */
function pairs(tokens: Token[]): [string, string][] {
  return tokens.map((t) => [t.type, t.value]);
}

describe('Sprig Lexer', () => {
  describe('single characters', () => {
    it('scans every delimiter and operator', () => {
      expect(pairs(tokenize('=+(){},;-!*/<>'))).toEqual([
        ['ASSIGN', '='],
        ['PLUS', '+'],
        ['LPAREN', '('],
        ['RPAREN', ')'],
        ['LBRACE', '{'],
        ['RBRACE', '}'],
        ['COMMA', ','],
        ['SEMICOLON', ';'],
        ['MINUS', '-'],
        ['BANG', '!'],
        ['ASTERISK', '*'],
        ['SLASH', '/'],
        ['LT', '<'],
        ['GT', '>'],
        ['EOF', ''],
      ]);
    });

    it.each([
      ['=', 'ASSIGN'],
      ['+', 'PLUS'],
      ['-', 'MINUS'],
      ['!', 'BANG'],
      ['*', 'ASTERISK'],
      ['/', 'SLASH'],
      ['<', 'LT'],
      ['>', 'GT'],
      ['==', 'EQ'],
      ['!=', 'NOT_EQ'],
      [',', 'COMMA'],
      [';', 'SEMICOLON'],
      ['(', 'LPAREN'],
      [')', 'RPAREN'],
      ['{', 'LBRACE'],
      ['}', 'RBRACE'],
    ])('scans %s alone as one %s token then EOF', (source, type) => {
      expect(pairs(tokenize(source))).toEqual([
        [type, source],
        ['EOF', ''],
      ]);
    });
  });

  describe('two-character operators', () => {
    it('prefers == and != over their single-character prefixes', () => {
      expect(pairs(tokenize('a == b != c'))).toEqual([
        ['IDENT', 'a'],
        ['EQ', '=='],
        ['IDENT', 'b'],
        ['NOT_EQ', '!='],
        ['IDENT', 'c'],
        ['EOF', ''],
      ]);
    });

    it('splits longer runs greedily from the left', () => {
      expect(pairs(tokenize('===!=='))).toEqual([
        ['EQ', '=='],
        ['ASSIGN', '='],
        ['NOT_EQ', '!='],
        ['ASSIGN', '='],
        ['EOF', ''],
      ]);
    });

    it('does not join = followed by !', () => {
      expect(pairs(tokenize('=!'))).toEqual([
        ['ASSIGN', '='],
        ['BANG', '!'],
        ['EOF', ''],
      ]);
    });
  });

  describe('identifiers and keywords', () => {
    it('recognizes every keyword', () => {
      expect(pairs(tokenize('fn let true false if else return'))).toEqual([
        ['FUNCTION', 'fn'],
        ['LET', 'let'],
        ['TRUE', 'true'],
        ['FALSE', 'false'],
        ['IF', 'if'],
        ['ELSE', 'else'],
        ['RETURN', 'return'],
        ['EOF', ''],
      ]);
    });

    it('matches keywords case-sensitively and as whole words', () => {
      expect(pairs(tokenize('LET lettuce iffy Fn'))).toEqual([
        ['IDENT', 'LET'],
        ['IDENT', 'lettuce'],
        ['IDENT', 'iffy'],
        ['IDENT', 'Fn'],
        ['EOF', ''],
      ]);
    });

    it('accepts underscores anywhere in an identifier', () => {
      expect(pairs(tokenize('_private snake_case'))).toEqual([
        ['IDENT', '_private'],
        ['IDENT', 'snake_case'],
        ['EOF', ''],
      ]);
    });

    it('ends an identifier at a digit', () => {
      expect(pairs(tokenize('x1'))).toEqual([
        ['IDENT', 'x'],
        ['INT', '1'],
        ['EOF', ''],
      ]);
    });

    it('exposes the keyword table', () => {
      expect(KEYWORDS.size).toBe(7);
      expect(KEYWORDS.get('return')).toBe('RETURN');
      expect(KEYWORDS.get('constructor')).toBeUndefined();
    });

    it('does not treat object prototype names as keywords', () => {
      expect(pairs(tokenize('constructor toString'))).toEqual([
        ['IDENT', 'constructor'],
        ['IDENT', 'toString'],
        ['EOF', ''],
      ]);
    });
  });

  describe('integers', () => {
    it('keeps the digit text unconverted', () => {
      expect(pairs(tokenize('0 007 99999999999999999999'))).toEqual([
        ['INT', '0'],
        ['INT', '007'],
        ['INT', '99999999999999999999'],
        ['EOF', ''],
      ]);
    });

    it('scans a leading minus as a separate token', () => {
      expect(pairs(tokenize('-5'))).toEqual([
        ['MINUS', '-'],
        ['INT', '5'],
        ['EOF', ''],
      ]);
    });
  });

  describe('whitespace', () => {
    it('skips spaces, tabs, carriage returns and newlines', () => {
      expect(pairs(tokenize(' \t\r\n  x \n'))).toEqual([
        ['IDENT', 'x'],
        ['EOF', ''],
      ]);
    });

    it('returns only EOF for empty input', () => {
      expect(pairs(tokenize(''))).toEqual([['EOF', '']]);
    });
  });

  describe('illegal characters', () => {
    it('emits ILLEGAL and continues scanning', () => {
      expect(pairs(tokenize('a $ b'))).toEqual([
        ['IDENT', 'a'],
        ['ILLEGAL', '$'],
        ['IDENT', 'b'],
        ['EOF', ''],
      ]);
    });

    it('emits one ILLEGAL token per offending character', () => {
      expect(pairs(tokenize('@#'))).toEqual([
        ['ILLEGAL', '@'],
        ['ILLEGAL', '#'],
        ['EOF', ''],
      ]);
    });

    it('keeps an astral character whole in one ILLEGAL token', () => {
      const tokens = tokenize('a \u{1F600} b');
      expect(pairs(tokens)).toEqual([
        ['IDENT', 'a'],
        ['ILLEGAL', '\u{1F600}'],
        ['IDENT', 'b'],
        ['EOF', ''],
      ]);
      expect(tokens[1]?.span).toEqual({
        start: { line: 1, column: 3, offset: 2 },
        end: { line: 1, column: 4, offset: 4 },
      });
      expect(tokens[2]?.span.start).toEqual({ line: 1, column: 5, offset: 5 });
    });

    it('treats non-ASCII letters as illegal', () => {
      expect(pairs(tokenize('é'))).toEqual([
        ['ILLEGAL', 'é'],
        ['EOF', ''],
      ]);
    });
  });

  describe('a complete program', () => {
    it('scans definitions, calls and conditionals', () => {
      const source = [
        'let total = 40;',
        'let sum = fn(a, b) { a + b; };',
        'let out = sum(total, 2);',
        'if (out != 42) { return false; } else { return !true; }',
        '9 / 3 * -1 > 0 == true;',
      ].join('\n');

      expect(pairs(tokenize(source))).toEqual([
        ['LET', 'let'],
        ['IDENT', 'total'],
        ['ASSIGN', '='],
        ['INT', '40'],
        ['SEMICOLON', ';'],
        ['LET', 'let'],
        ['IDENT', 'sum'],
        ['ASSIGN', '='],
        ['FUNCTION', 'fn'],
        ['LPAREN', '('],
        ['IDENT', 'a'],
        ['COMMA', ','],
        ['IDENT', 'b'],
        ['RPAREN', ')'],
        ['LBRACE', '{'],
        ['IDENT', 'a'],
        ['PLUS', '+'],
        ['IDENT', 'b'],
        ['SEMICOLON', ';'],
        ['RBRACE', '}'],
        ['SEMICOLON', ';'],
        ['LET', 'let'],
        ['IDENT', 'out'],
        ['ASSIGN', '='],
        ['IDENT', 'sum'],
        ['LPAREN', '('],
        ['IDENT', 'total'],
        ['COMMA', ','],
        ['INT', '2'],
        ['RPAREN', ')'],
        ['SEMICOLON', ';'],
        ['IF', 'if'],
        ['LPAREN', '('],
        ['IDENT', 'out'],
        ['NOT_EQ', '!='],
        ['INT', '42'],
        ['RPAREN', ')'],
        ['LBRACE', '{'],
        ['RETURN', 'return'],
        ['FALSE', 'false'],
        ['SEMICOLON', ';'],
        ['RBRACE', '}'],
        ['ELSE', 'else'],
        ['LBRACE', '{'],
        ['RETURN', 'return'],
        ['BANG', '!'],
        ['TRUE', 'true'],
        ['SEMICOLON', ';'],
        ['RBRACE', '}'],
        ['INT', '9'],
        ['SLASH', '/'],
        ['INT', '3'],
        ['ASTERISK', '*'],
        ['MINUS', '-'],
        ['INT', '1'],
        ['GT', '>'],
        ['INT', '0'],
        ['EQ', '=='],
        ['TRUE', 'true'],
        ['SEMICOLON', ';'],
        ['EOF', ''],
      ]);
    });

    it('is deterministic', () => {
      const source = 'let f = fn(x) { x * 2 }; f(3) != 5';
      expect(tokenize(source)).toEqual(tokenize(source));
    });
  });

  describe('spans', () => {
    it('records line, column and offset for start and end', () => {
      const [let_, name, assign, int, semi, next, eof] = tokenize(
        'let x = 10;\n  y'
      );

      expect(let_?.span).toEqual({
        start: { line: 1, column: 1, offset: 0 },
        end: { line: 1, column: 4, offset: 3 },
      });
      expect(name?.span.start).toEqual({ line: 1, column: 5, offset: 4 });
      expect(assign?.span.start).toEqual({ line: 1, column: 7, offset: 6 });
      expect(int?.span).toEqual({
        start: { line: 1, column: 9, offset: 8 },
        end: { line: 1, column: 11, offset: 10 },
      });
      expect(semi?.span.end).toEqual({ line: 1, column: 12, offset: 11 });
      expect(next?.span).toEqual({
        start: { line: 2, column: 3, offset: 14 },
        end: { line: 2, column: 4, offset: 15 },
      });
      expect(eof?.span).toEqual({
        start: { line: 2, column: 4, offset: 15 },
        end: { line: 2, column: 4, offset: 15 },
      });
    });

    it('covers both characters of a two-character operator', () => {
      const tokens = tokenize('a!=b');
      expect(tokens[1]?.span).toEqual({
        start: { line: 1, column: 2, offset: 1 },
        end: { line: 1, column: 4, offset: 3 },
      });
    });
  });

  describe('cursor', () => {
    it('loads the first character on creation', () => {
      expect(createLexerState('ab')).toEqual({
        source: 'ab',
        position: 0,
        readPosition: 1,
        ch: 'a',
        line: 1,
        column: 1,
      });
    });

    it('starts at end of input for an empty source', () => {
      const state = createLexerState('');
      expect(state.ch).toBe('');
      expect(peekChar(state)).toBe('');
    });

    it('moves one character at a time and stops at the end', () => {
      const state = createLexerState('a\nb');
      expect(peekChar(state)).toBe('\n');
      readChar(state);
      expect([state.ch, state.line, state.column]).toEqual(['\n', 1, 2]);
      readChar(state);
      expect([state.ch, state.line, state.column, state.position]).toEqual(['b', 2, 1, 2]);
      readChar(state);
      readChar(state);
      expect([state.ch, state.line, state.column, state.position]).toEqual(['', 2, 2, 3]);
    });

    it('steps over both halves of a surrogate pair', () => {
      const state = createLexerState('\u{1F600}x');
      expect(state.readPosition).toBe(2);
      readChar(state);
      expect([state.ch, state.position, state.column]).toEqual(['x', 2, 2]);
    });
  });

  describe('nextToken', () => {
    it('keeps returning EOF once input is exhausted', () => {
      const state = createLexerState('x');
      expect(nextToken(state).type).toBe('IDENT');
      expect(nextToken(state)).toEqual({
        type: 'EOF',
        value: '',
        span: {
          start: { line: 1, column: 2, offset: 1 },
          end: { line: 1, column: 2, offset: 1 },
        },
      });
      expect(nextToken(state).type).toBe('EOF');
      expect(nextToken(state).type).toBe('EOF');
    });

    it('advances exactly one token per call', () => {
      const state = createLexerState('fn()');
      expect(nextToken(state).value).toBe('fn');
      expect(nextToken(state).value).toBe('(');
      expect(nextToken(state).value).toBe(')');
      expect(nextToken(state).type).toBe('EOF');
    });
  });
});
