/**
 * Sprig Parser Tests: Errors and Recovery
 * Error messages, locations and the statements kept after a failure
 */

import { describe, expect, it } from 'vitest';
import { parse, ParseError, renderProgram } from '../../src/index.js';
import { errorMessages } from '../helpers/ast.js';

describe('Sprig Parser: Errors', () => {
  it('reports a let without a name and resumes after it', () => {
    const result = parse('let = 5;');

    expect(result.success).toBe(false);
    expect(errorMessages(result)).toEqual([
      'expected next token to be IDENT, got ASSIGN instead',
      'no prefix parse function for ASSIGN found',
    ]);
    expect(result.errors.map((e) => e.location)).toEqual([
      { line: 1, column: 5, offset: 4 },
      { line: 1, column: 5, offset: 4 },
    ]);
    expect(renderProgram(result.program)).toBe('5');
  });

  it('reports a let without =', () => {
    const result = parse('let x 5;');
    expect(errorMessages(result)).toEqual([
      'expected next token to be ASSIGN, got INT instead',
    ]);
    expect(result.errors[0]?.location).toEqual({ line: 1, column: 7, offset: 6 });
  });

  it('reports an operator that cannot start an expression', () => {
    const result = parse('* 5');
    expect(errorMessages(result)).toEqual([
      'no prefix parse function for ASTERISK found',
    ]);
    expect(renderProgram(result.program)).toBe('5');
  });

  it('reports an unclosed group at end of input', () => {
    const result = parse('(1 + 2');
    expect(errorMessages(result)).toEqual([
      'expected next token to be RPAREN, got EOF instead',
    ]);
    expect(result.errors[0]?.location).toEqual({ line: 1, column: 7, offset: 6 });
    expect(result.program.statements).toEqual([]);
  });

  it('reports an unclosed argument list', () => {
    const result = parse('add(1, 2');
    expect(errorMessages(result)).toEqual([
      'expected next token to be RPAREN, got EOF instead',
    ]);
  });

  it('reports an unclosed block instead of looping', () => {
    const result = parse('if (x) { x');
    expect(errorMessages(result)).toEqual([
      'expected next token to be RBRACE, got EOF instead',
    ]);
    expect(result.errors[0]?.location).toEqual({ line: 1, column: 11, offset: 10 });
    expect(result.program.statements).toEqual([]);
  });

  it('reports an if without parentheses', () => {
    const result = parse('if x { x }');
    expect(errorMessages(result)[0]).toBe(
      'expected next token to be LPAREN, got IDENT instead'
    );
  });

  it('reports an illegal character as a token with no prefix handler', () => {
    const result = parse('let x = 5 @ 2;');
    expect(errorMessages(result)).toEqual([
      'no prefix parse function for ILLEGAL found',
    ]);
    expect(result.errors[0]?.location).toEqual({ line: 1, column: 11, offset: 10 });
    expect(renderProgram(result.program)).toBe('let x = 5; 2');
  });

  it('reports a non-identifier parameter and every stray token after it', () => {
    const result = parse('fn(x, 1) {}');
    expect(errorMessages(result)).toEqual([
      'expected next token to be IDENT, got INT instead',
      'no prefix parse function for RPAREN found',
      'no prefix parse function for LBRACE found',
      'no prefix parse function for RBRACE found',
    ]);
    expect(renderProgram(result.program)).toBe('1');
  });

  it('keeps later statements after a failed one', () => {
    const result = parse('let = 1; let y = 2;');
    expect(result.errors).toHaveLength(2);
    expect(renderProgram(result.program)).toBe('1; let y = 2;');
  });

  it('reports errors on later lines with their line number', () => {
    const result = parse('let a = 1;\nlet b 2;');
    expect(result.errors[0]?.location).toEqual({ line: 2, column: 7, offset: 17 });
    expect(result.errors[0]?.message).toBe(
      'expected next token to be ASSIGN, got INT instead at 2:7'
    );
  });

  it('records ParseError instances carrying registry IDs', () => {
    const result = parse('let = 5;');
    expect(result.errors[0]).toBeInstanceOf(ParseError);
    expect(result.errors.map((e) => e.errorId)).toEqual([
      'SPRIG-P001',
      'SPRIG-P002',
    ]);
    expect(result.errors[0]?.context).toEqual({
      expected: 'IDENT',
      actual: 'ASSIGN',
    });
  });

  it('never throws on arbitrary input', () => {
    for (const source of [')', '}', ';;;', 'let', 'return', 'fn', 'if', '!', '((((', 'fn(']) {
      expect(() => parse(source)).not.toThrow();
    }
  });
});
