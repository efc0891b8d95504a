/**
 * Parser Extension: Program Parsing
 * Program, statements and blocks
 */

import { Parser } from './parser.js';
import type {
  BlockStatementNode,
  ExpressionStatementNode,
  LetStatementNode,
  ProgramNode,
  ReturnStatementNode,
  StatementNode,
} from '../types.js';
import { TOKEN_TYPES, createParseError } from '../types.js';
import { PRECEDENCE } from './helpers.js';
import {
  advance,
  currentIs,
  expectPeek,
  peekIs,
  recordError,
  traceRule,
} from './state.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseProgram(): ProgramNode;
    parseStatement(): StatementNode | null;
    parseLetStatement(): LetStatementNode | null;
    parseReturnStatement(): ReturnStatementNode | null;
    parseExpressionStatement(): ExpressionStatementNode | null;
    parseBlockStatement(): BlockStatementNode | null;
  }
}

// ============================================================
// PROGRAM PARSING
// ============================================================

/**
 * Parse statements until EOF. A statement that fails is left out; parsing
 * resumes at the token after the one where it stopped.
 */
Parser.prototype.parseProgram = function (this: Parser): ProgramNode {
  return traceRule<ProgramNode>(this.state, 'parseProgram', () => {
    const statements: StatementNode[] = [];

    while (!currentIs(this.state, TOKEN_TYPES.EOF)) {
      const statement = this.parseStatement();
      if (statement) {
        statements.push(statement);
      }
      advance(this.state);
    }

    return { type: 'Program', statements };
  });
};

// ============================================================
// STATEMENT PARSING
// ============================================================

Parser.prototype.parseStatement = function (
  this: Parser
): StatementNode | null {
  switch (this.state.current.type) {
    case TOKEN_TYPES.LET:
      return this.parseLetStatement();
    case TOKEN_TYPES.RETURN:
      return this.parseReturnStatement();
    default:
      return this.parseExpressionStatement();
  }
};

/** let <identifier> = <expression> [;] */
Parser.prototype.parseLetStatement = function (
  this: Parser
): LetStatementNode | null {
  return traceRule<LetStatementNode | null>(this.state, 'parseLetStatement', () => {
    const token = this.state.current;

    if (!expectPeek(this.state, TOKEN_TYPES.IDENT)) return null;
    const nameToken = this.state.current;

    if (!expectPeek(this.state, TOKEN_TYPES.ASSIGN)) return null;
    advance(this.state); // consume =

    const value = this.parseExpression(PRECEDENCE.LOWEST);
    if (peekIs(this.state, TOKEN_TYPES.SEMICOLON)) {
      advance(this.state);
    }
    if (!value) return null;

    return {
      type: 'LetStatement',
      token,
      name: { type: 'Identifier', token: nameToken, name: nameToken.value },
      value,
    };
  });
};

/** return <expression> [;] */
Parser.prototype.parseReturnStatement = function (
  this: Parser
): ReturnStatementNode | null {
  return traceRule<ReturnStatementNode | null>(this.state, 'parseReturnStatement', () => {
    const token = this.state.current;
    advance(this.state); // consume return

    const value = this.parseExpression(PRECEDENCE.LOWEST);
    if (peekIs(this.state, TOKEN_TYPES.SEMICOLON)) {
      advance(this.state);
    }
    if (!value) return null;

    return { type: 'ReturnStatement', token, value };
  });
};

/** <expression> [;] */
Parser.prototype.parseExpressionStatement = function (
  this: Parser
): ExpressionStatementNode | null {
  return traceRule<ExpressionStatementNode | null>(this.state, 'parseExpressionStatement', () => {
    const token = this.state.current;

    const expression = this.parseExpression(PRECEDENCE.LOWEST);
    if (peekIs(this.state, TOKEN_TYPES.SEMICOLON)) {
      advance(this.state);
    }
    if (!expression) return null;

    return { type: 'ExpressionStatement', token, expression };
  });
};

// ============================================================
// BLOCK PARSING
// ============================================================

/**
 * { <statement>* }
 * Entered with the opening brace as the current token; leaves the closing
 * brace current. Running out of input before the brace fails the block.
 */
Parser.prototype.parseBlockStatement = function (
  this: Parser
): BlockStatementNode | null {
  return traceRule<BlockStatementNode | null>(this.state, 'parseBlockStatement', () => {
    const token = this.state.current;
    const statements: StatementNode[] = [];
    advance(this.state); // consume {

    while (!currentIs(this.state, TOKEN_TYPES.RBRACE)) {
      if (currentIs(this.state, TOKEN_TYPES.EOF)) {
        recordError(
          this.state,
          createParseError(
            'SPRIG-P001',
            { expected: TOKEN_TYPES.RBRACE, actual: TOKEN_TYPES.EOF },
            this.state.current.span.start
          )
        );
        return null;
      }

      const statement = this.parseStatement();
      if (statement) {
        statements.push(statement);
      }
      advance(this.state);
    }

    return { type: 'BlockStatement', token, statements };
  });
};
