/**
 * Sprig Module
 * Exports lexer, parser, AST types and rendering
 */

export {
  createLexerState,
  KEYWORDS,
  nextToken,
  tokenize,
  type LexerState,
} from './lexer/index.js';
export {
  parse,
  Parser,
  PRECEDENCE,
  PRECEDENCES,
  type InfixParseFn,
  type ParseCallbacks,
  type ParserOptions,
  type Precedence,
  type PrefixParseFn,
  type TraceEvent,
} from './parser/index.js';
export { renderNode, renderProgram, tokenLiteral } from './ast-render.js';

// ============================================================
// TYPES AND ERROR TAXONOMY
// ============================================================
export * from './types.js';
