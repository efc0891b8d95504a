/**
 * Parser Class - Core
 *
 * Defines the Parser class structure. Methods are added via prototype
 * extension from separate modules, using TypeScript declaration merging
 * for type safety. The extension modules are loaded by ./index.ts.
 */

import { createLexerState, type LexerState } from '../lexer/index.js';
import type { ExpressionNode, ParseError, TokenType } from '../types.js';
import { TOKEN_TYPES } from '../types.js';
import {
  type ParseCallbacks,
  type ParserState,
  createParserState,
} from './state.js';

/** Parses an expression that starts at the current token */
export type PrefixParseFn = () => ExpressionNode | null;

/** Parses the rest of an expression whose operator is the current token */
export type InfixParseFn = (left: ExpressionNode) => ExpressionNode | null;

export interface ParserOptions {
  callbacks?: ParseCallbacks;
}

/**
 * Pratt parser that converts a token stream into a Program.
 *
 * Methods are organized across multiple files:
 * - parser-program.ts: program, statements, blocks
 * - parser-expr.ts: precedence climbing, prefix/infix operators, grouping
 * - parser-literals.ts: identifiers, integers, booleans
 * - parser-control.ts: if/else
 * - parser-functions.ts: function literals and calls
 *
 * Syntax errors never throw. They are collected in `errors` and the
 * statement they occur in is left out of the program.
 *
 * @example
 * ```typescript
 * const parser = new Parser('let x = 5;');
 * const program = parser.parseProgram();
 * if (parser.errors.length > 0) { ... }
 * ```
 */
export class Parser {
  /** Parse session: token window, errors and callbacks */
  state: ParserState;

  /** Handlers for tokens that begin an expression, keyed by token type */
  readonly prefixParseFns: Readonly<Partial<Record<TokenType, PrefixParseFn>>>;

  /** Handlers for tokens that continue an expression, keyed by token type */
  readonly infixParseFns: Readonly<Partial<Record<TokenType, InfixParseFn>>>;

  constructor(input: string | LexerState, options: ParserOptions = {}) {
    const lexer = typeof input === 'string' ? createLexerState(input) : input;
    this.state = createParserState(lexer, options.callbacks);

    const prefixExpression: PrefixParseFn = () => this.parsePrefixExpression();
    const boolean: PrefixParseFn = () => this.parseBoolean();
    this.prefixParseFns = {
      [TOKEN_TYPES.IDENT]: () => this.parseIdentifier(),
      [TOKEN_TYPES.INT]: () => this.parseIntegerLiteral(),
      [TOKEN_TYPES.BANG]: prefixExpression,
      [TOKEN_TYPES.MINUS]: prefixExpression,
      [TOKEN_TYPES.TRUE]: boolean,
      [TOKEN_TYPES.FALSE]: boolean,
      [TOKEN_TYPES.LPAREN]: () => this.parseGroupedExpression(),
      [TOKEN_TYPES.IF]: () => this.parseIfExpression(),
      [TOKEN_TYPES.FUNCTION]: () => this.parseFunctionLiteral(),
    };

    const infixExpression: InfixParseFn = (left) =>
      this.parseInfixExpression(left);
    this.infixParseFns = {
      [TOKEN_TYPES.PLUS]: infixExpression,
      [TOKEN_TYPES.MINUS]: infixExpression,
      [TOKEN_TYPES.SLASH]: infixExpression,
      [TOKEN_TYPES.ASTERISK]: infixExpression,
      [TOKEN_TYPES.EQ]: infixExpression,
      [TOKEN_TYPES.NOT_EQ]: infixExpression,
      [TOKEN_TYPES.LT]: infixExpression,
      [TOKEN_TYPES.GT]: infixExpression,
      [TOKEN_TYPES.LPAREN]: (callee) => this.parseCallExpression(callee),
    };
  }

  /**
   * Errors recorded so far, in the order they were found.
   */
  get errors(): ParseError[] {
    return this.state.errors;
  }
}
