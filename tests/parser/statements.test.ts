/**
 * Sprig Parser Tests: Statements
 * let, return and expression statements
 */

import { describe, expect, it } from 'vitest';
import { createLexerState, parse, Parser } from '../../src/index.js';
import { expectNode, parseOk, renderOk } from '../helpers/ast.js';

describe('Sprig Parser: Statements', () => {
  describe('let statements', () => {
    it.each([
      ['let x = 5;', 'x', 'IntegerLiteral'],
      ['let y = true;', 'y', 'BooleanLiteral'],
      ['let foobar = y;', 'foobar', 'Identifier'],
    ] as const)('parses %s', (source, name, valueType) => {
      const program = parseOk(source);
      expect(program.statements).toHaveLength(1);

      const statement = expectNode(program.statements[0], 'LetStatement');
      expect(statement.token.value).toBe('let');
      expect(statement.name.name).toBe(name);
      expect(statement.name.token.type).toBe('IDENT');
      expect(statement.value.type).toBe(valueType);
    });

    it('keeps the integer value', () => {
      const statement = expectNode(parseOk('let x = 5;').statements[0], 'LetStatement');
      const value = expectNode(statement.value, 'IntegerLiteral');
      expect(value.value).toBe(5n);
    });

    it('parses the full value expression', () => {
      expect(renderOk('let x = 1 + 2 * 3;')).toBe('let x = (1 + (2 * 3));');
    });

    it('makes the trailing semicolon optional', () => {
      const program = parseOk('let x = 1 let y = 2');
      expect(program.statements.map((s) => s.type)).toEqual([
        'LetStatement',
        'LetStatement',
      ]);
      expect(renderOk('let x = 1 let y = 2')).toBe('let x = 1; let y = 2;');
    });
  });

  describe('return statements', () => {
    it('parses return with a value', () => {
      const statement = expectNode(parseOk('return 5;').statements[0], 'ReturnStatement');
      expect(statement.token.value).toBe('return');
      expect(expectNode(statement.value, 'IntegerLiteral').value).toBe(5n);
    });

    it('parses the full return expression', () => {
      expect(renderOk('return x + y;')).toBe('return (x + y);');
    });

    it('parses several returns in sequence', () => {
      const program = parseOk('return 5; return 10; return 993322;');
      expect(program.statements).toHaveLength(3);
      expect(program.statements.every((s) => s.type === 'ReturnStatement')).toBe(true);
    });
  });

  describe('expression statements', () => {
    it('wraps a bare expression', () => {
      const statement = expectNode(parseOk('foobar;').statements[0], 'ExpressionStatement');
      expect(statement.token.value).toBe('foobar');
      expect(expectNode(statement.expression, 'Identifier').name).toBe('foobar');
    });

    it('accepts an expression without a semicolon at end of input', () => {
      expect(renderOk('x + 1')).toBe('(x + 1)');
    });

    it('keeps statements in source order', () => {
      const program = parseOk('a; b; c;');
      expect(
        program.statements.map(
          (s) => expectNode(expectNode(s, 'ExpressionStatement').expression, 'Identifier').name
        )
      ).toEqual(['a', 'b', 'c']);
    });
  });

  describe('empty input', () => {
    it.each(['', '   ', '\n\t\n'])('parses %j to an empty program', (source) => {
      const result = parse(source);
      expect(result.success).toBe(true);
      expect(result.errors).toEqual([]);
      expect(result.program).toEqual({ type: 'Program', statements: [] });
    });
  });

  describe('Parser class', () => {
    it('exposes parseProgram and errors', () => {
      const parser = new Parser('let x = 5;');
      const program = parser.parseProgram();
      expect(program.statements).toHaveLength(1);
      expect(parser.errors).toEqual([]);
    });

    it('accepts an existing lexer state', () => {
      const result = parse(createLexerState('let x = 1;'));
      expect(result.success).toBe(true);
      expect(result.program.statements).toHaveLength(1);
    });
  });
});
