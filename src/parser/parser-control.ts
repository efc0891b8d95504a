/**
 * Parser Extension: Control Flow Parsing
 * Conditional expressions
 */

import { Parser } from './parser.js';
import type { BlockStatementNode, IfExpressionNode } from '../types.js';
import { TOKEN_TYPES } from '../types.js';
import { PRECEDENCE } from './helpers.js';
import { advance, expectPeek, peekIs, traceRule } from './state.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseIfExpression(): IfExpressionNode | null;
  }
}

/**
 * if (<condition>) { ... } [else { ... }]
 * Parentheses around the condition and braces around both branches are
 * required.
 */
Parser.prototype.parseIfExpression = function (
  this: Parser
): IfExpressionNode | null {
  return traceRule<IfExpressionNode | null>(this.state, 'parseIfExpression', () => {
    const token = this.state.current;

    if (!expectPeek(this.state, TOKEN_TYPES.LPAREN)) return null;
    advance(this.state); // consume (

    const condition = this.parseExpression(PRECEDENCE.LOWEST);
    if (!condition) return null;
    if (!expectPeek(this.state, TOKEN_TYPES.RPAREN)) return null;
    if (!expectPeek(this.state, TOKEN_TYPES.LBRACE)) return null;

    const consequence = this.parseBlockStatement();
    if (!consequence) return null;

    let alternative: BlockStatementNode | null = null;
    if (peekIs(this.state, TOKEN_TYPES.ELSE)) {
      advance(this.state);
      if (!expectPeek(this.state, TOKEN_TYPES.LBRACE)) return null;

      alternative = this.parseBlockStatement();
      if (!alternative) return null;
    }

    return { type: 'IfExpression', token, condition, consequence, alternative };
  });
};
