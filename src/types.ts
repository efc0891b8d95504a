/**
 * Sprig Types
 * Single import point for tokens, AST nodes and errors
 */

export * from './token-types.js';
export * from './ast-nodes.js';
export * from './error-registry.js';
export * from './error-classes.js';

// ============================================================
// PARSE RESULT
// ============================================================

import type { ProgramNode } from './ast-nodes.js';
import type { ParseError } from './error-classes.js';

/**
 * Outcome of parsing a source text. The program holds every statement
 * that parsed; when errors is non-empty the program may be partial.
 */
export interface ParseResult {
  readonly program: ProgramNode;
  readonly errors: ParseError[];
  /** True when no errors were recorded */
  readonly success: boolean;
}
