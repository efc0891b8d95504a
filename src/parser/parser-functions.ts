/**
 * Parser Extension: Function Parsing
 * Function literals and call expressions
 */

import { Parser } from './parser.js';
import type {
  CallExpressionNode,
  ExpressionNode,
  FunctionLiteralNode,
  IdentifierNode,
} from '../types.js';
import { TOKEN_TYPES } from '../types.js';
import { PRECEDENCE } from './helpers.js';
import { advance, expectPeek, peekIs, traceRule } from './state.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseFunctionLiteral(): FunctionLiteralNode | null;
    parseFunctionParameters(): IdentifierNode[] | null;
    parseCallExpression(callee: ExpressionNode): CallExpressionNode | null;
    parseCallArguments(): ExpressionNode[] | null;
  }
}

// ============================================================
// FUNCTION LITERALS
// ============================================================

/** fn(<params>) { <body> } */
Parser.prototype.parseFunctionLiteral = function (
  this: Parser
): FunctionLiteralNode | null {
  return traceRule<FunctionLiteralNode | null>(this.state, 'parseFunctionLiteral', () => {
    const token = this.state.current;

    if (!expectPeek(this.state, TOKEN_TYPES.LPAREN)) return null;
    const parameters = this.parseFunctionParameters();
    if (!parameters) return null;

    if (!expectPeek(this.state, TOKEN_TYPES.LBRACE)) return null;
    const body = this.parseBlockStatement();
    if (!body) return null;

    return { type: 'FunctionLiteral', token, parameters, body };
  });
};

/**
 * Comma-separated identifiers. Entered on the opening parenthesis, leaves
 * the closing one current.
 */
Parser.prototype.parseFunctionParameters = function (
  this: Parser
): IdentifierNode[] | null {
  const parameters: IdentifierNode[] = [];

  if (peekIs(this.state, TOKEN_TYPES.RPAREN)) {
    advance(this.state);
    return parameters;
  }

  if (!expectPeek(this.state, TOKEN_TYPES.IDENT)) return null;
  parameters.push(this.parseIdentifier());

  while (peekIs(this.state, TOKEN_TYPES.COMMA)) {
    advance(this.state); // move onto ,
    if (!expectPeek(this.state, TOKEN_TYPES.IDENT)) return null;
    parameters.push(this.parseIdentifier());
  }

  if (!expectPeek(this.state, TOKEN_TYPES.RPAREN)) return null;
  return parameters;
};

// ============================================================
// CALLS
// ============================================================

/** <callee>(<args>); entered with the opening parenthesis current */
Parser.prototype.parseCallExpression = function (
  this: Parser,
  callee: ExpressionNode
): CallExpressionNode | null {
  return traceRule<CallExpressionNode | null>(this.state, 'parseCallExpression', () => {
    const token = this.state.current;

    const args = this.parseCallArguments();
    if (!args) return null;

    return { type: 'CallExpression', token, callee, arguments: args };
  });
};

Parser.prototype.parseCallArguments = function (
  this: Parser
): ExpressionNode[] | null {
  const args: ExpressionNode[] = [];

  if (peekIs(this.state, TOKEN_TYPES.RPAREN)) {
    advance(this.state);
    return args;
  }

  advance(this.state); // consume (
  const first = this.parseExpression(PRECEDENCE.LOWEST);
  if (!first) return null;
  args.push(first);

  while (peekIs(this.state, TOKEN_TYPES.COMMA)) {
    advance(this.state); // move onto ,
    advance(this.state); // consume ,
    const arg = this.parseExpression(PRECEDENCE.LOWEST);
    if (!arg) return null;
    args.push(arg);
  }

  if (!expectPeek(this.state, TOKEN_TYPES.RPAREN)) return null;
  return args;
};
