/**
 * Parser Extension: Expression Parsing
 * Precedence climbing, prefix and infix operators, grouping
 */

import { Parser } from './parser.js';
import type {
  ExpressionNode,
  InfixExpressionNode,
  PrefixExpressionNode,
} from '../types.js';
import { TOKEN_TYPES, createParseError } from '../types.js';
import { PRECEDENCE, type Precedence, precedenceOf } from './helpers.js';
import {
  advance,
  expectPeek,
  peekIs,
  recordError,
  traceRule,
} from './state.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseExpression(precedence: Precedence): ExpressionNode | null;
    parsePrefixExpression(): PrefixExpressionNode | null;
    parseInfixExpression(left: ExpressionNode): InfixExpressionNode | null;
    parseGroupedExpression(): ExpressionNode | null;
  }
}

// ============================================================
// PRECEDENCE CLIMBING
// ============================================================

/**
 * Parse an expression starting at the current token.
 *
 * The prefix handler for the current token produces the left operand. While
 * the lookahead token binds tighter than `precedence`, its infix handler
 * folds the left operand into a larger expression. On return the current
 * token is the last token of the expression.
 *
 * Returns null when any part of the expression failed; the error has
 * already been recorded.
 */
Parser.prototype.parseExpression = function (
  this: Parser,
  precedence: Precedence
): ExpressionNode | null {
  return traceRule<ExpressionNode | null>(this.state, 'parseExpression', () => {
    const prefix = this.prefixParseFns[this.state.current.type];
    if (!prefix) {
      recordError(
        this.state,
        createParseError(
          'SPRIG-P002',
          { token: this.state.current.type },
          this.state.current.span.start
        )
      );
      return null;
    }

    let left = prefix();
    if (!left) return null;

    while (
      !peekIs(this.state, TOKEN_TYPES.SEMICOLON) &&
      precedence < precedenceOf(this.state.peekToken.type)
    ) {
      const infix = this.infixParseFns[this.state.peekToken.type];
      if (!infix) return left;

      advance(this.state);
      left = infix(left);
      if (!left) return null;
    }

    return left;
  });
};

// ============================================================
// OPERATORS
// ============================================================

/** !<expr> or -<expr>; the operand binds at PREFIX strength */
Parser.prototype.parsePrefixExpression = function (
  this: Parser
): PrefixExpressionNode | null {
  return traceRule<PrefixExpressionNode | null>(this.state, 'parsePrefixExpression', () => {
    const token = this.state.current;
    advance(this.state); // consume operator

    const right = this.parseExpression(PRECEDENCE.PREFIX);
    if (!right) return null;

    return {
      type: 'PrefixExpression',
      token,
      operator: token.value,
      right,
    };
  });
};

/**
 * <left> <op> <right>
 * The right operand is parsed at the operator's own precedence, which makes
 * operators of equal precedence group to the left.
 */
Parser.prototype.parseInfixExpression = function (
  this: Parser,
  left: ExpressionNode
): InfixExpressionNode | null {
  return traceRule<InfixExpressionNode | null>(this.state, 'parseInfixExpression', () => {
    const token = this.state.current;
    const precedence = precedenceOf(token.type);
    advance(this.state); // consume operator

    const right = this.parseExpression(precedence);
    if (!right) return null;

    return {
      type: 'InfixExpression',
      token,
      left,
      operator: token.value,
      right,
    };
  });
};

// ============================================================
// GROUPING
// ============================================================

/** ( <expr> ) yields the inner expression; no node is added for the parentheses */
Parser.prototype.parseGroupedExpression = function (
  this: Parser
): ExpressionNode | null {
  return traceRule<ExpressionNode | null>(this.state, 'parseGroupedExpression', () => {
    advance(this.state); // consume (

    const expression = this.parseExpression(PRECEDENCE.LOWEST);
    if (!expression) return null;
    if (!expectPeek(this.state, TOKEN_TYPES.RPAREN)) return null;

    return expression;
  });
};
