/**
 * Sprig Parser
 * Main entry point and re-exports
 */

import type { LexerState } from '../lexer/index.js';
import type { ParseResult } from '../types.js';
import { Parser, type ParserOptions } from './parser.js';

// Import extension modules to register prototype methods on Parser.
// These must be imported AFTER parser.js to ensure the class is defined.
import './parser-program.js';
import './parser-expr.js';
import './parser-literals.js';
import './parser-control.js';
import './parser-functions.js';

// ============================================================
// MAIN ENTRY POINT
// ============================================================

/**
 * Parse sprig source code into an AST.
 *
 * Never throws on malformed input: errors are collected and every statement
 * that parsed is kept in the program.
 *
 * @example
 * ```typescript
 * const result = parse('let x = 1 + 2;');
 * if (!result.success) {
 *   console.log('Errors:', result.errors);
 * }
 * ```
 */
export function parse(
  source: string | LexerState,
  options: ParserOptions = {}
): ParseResult {
  const parser = new Parser(source, options);
  const program = parser.parseProgram();

  return {
    program,
    errors: parser.errors,
    success: parser.errors.length === 0,
  };
}

// ============================================================
// RE-EXPORTS
// ============================================================

export {
  Parser,
  type InfixParseFn,
  type ParserOptions,
  type PrefixParseFn,
} from './parser.js';
export {
  createParserState,
  type ParseCallbacks,
  type ParserState,
  type TraceEvent,
} from './state.js';
export { PRECEDENCE, PRECEDENCES, type Precedence } from './helpers.js';
