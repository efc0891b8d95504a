/**
 * Parser Extension: Literal Parsing
 * Identifiers, integers and booleans
 */

import { Parser } from './parser.js';
import type {
  BooleanLiteralNode,
  IdentifierNode,
  IntegerLiteralNode,
} from '../types.js';
import { TOKEN_TYPES, createParseError } from '../types.js';
import { parseInt64 } from './helpers.js';
import { currentIs, recordError, traceRule } from './state.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseIdentifier(): IdentifierNode;
    parseIntegerLiteral(): IntegerLiteralNode | null;
    parseBoolean(): BooleanLiteralNode;
  }
}

Parser.prototype.parseIdentifier = function (this: Parser): IdentifierNode {
  const token = this.state.current;
  return { type: 'Identifier', token, name: token.value };
};

/**
 * Integer text is converted here rather than in the lexer. A value outside
 * the signed 64-bit range is recorded as an error.
 */
Parser.prototype.parseIntegerLiteral = function (
  this: Parser
): IntegerLiteralNode | null {
  return traceRule<IntegerLiteralNode | null>(this.state, 'parseIntegerLiteral', () => {
    const token = this.state.current;
    const value = parseInt64(token.value);

    if (value === null) {
      recordError(
        this.state,
        createParseError(
          'SPRIG-P003',
          { literal: JSON.stringify(token.value) },
          token.span.start
        )
      );
      return null;
    }

    return { type: 'IntegerLiteral', token, value };
  });
};

Parser.prototype.parseBoolean = function (this: Parser): BooleanLiteralNode {
  return {
    type: 'BooleanLiteral',
    token: this.state.current,
    value: currentIs(this.state, TOKEN_TYPES.TRUE),
  };
};
