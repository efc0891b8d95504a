/**
 * CLI Shared Utilities
 * Common formatting functions for CLI tools
 */

import type { Token, TraceEvent } from './index.js';
import { ParseError } from './types.js';

/** Line sink used by the CLI so tests can capture output */
export interface CliIO {
  log(line: string): void;
  error(line: string): void;
}

/** Writes to the process console */
export const consoleIO: CliIO = {
  log: (line) => console.log(line),
  error: (line) => console.error(line),
};

/**
 * Format one token as `TYPE literal`.
 */
export function formatToken(token: Token): string {
  return `${token.type} ${token.value}`;
}

/**
 * Format a trace event as an indented BEGIN/END line.
 */
export function formatTraceEvent(event: TraceEvent): string {
  const indent = '\t'.repeat(event.depth);
  const label = event.phase === 'enter' ? 'BEGIN' : 'END';
  return `${indent}${label} ${event.rule}`;
}

/**
 * Format error for stderr output
 */
export function formatError(err: Error): string {
  if (err instanceof ParseError) {
    return err.format(({ message, location }) =>
      location
        ? `Parse error at line ${location.line}: ${message}`
        : `Parse error: ${message}`
    );
  }

  return err.message;
}
