/**
 * Sprig Error Classes and Factory
 * Structured error types with registry-based error codes
 */

import type { SourceLocation } from './token-types.js';
import {
  ERROR_ID_PATTERN,
  ERROR_REGISTRY,
  renderMessage,
} from './error-registry.js';

// ============================================================
// ERROR DATA
// ============================================================

/** Structured error data for host applications */
export interface SprigErrorData {
  readonly errorId: string;
  readonly message: string;
  readonly location?: SourceLocation | undefined;
  readonly context?: Record<string, unknown> | undefined;
}

// ============================================================
// BASE ERROR CLASS
// ============================================================

/**
 * Base error class for all Sprig errors.
 * Provides structured data for host applications to format as needed.
 */
export class SprigError extends Error {
  readonly errorId: string;
  readonly location?: SourceLocation | undefined;
  readonly context?: Record<string, unknown> | undefined;

  constructor(data: SprigErrorData) {
    if (!data.errorId) {
      throw new TypeError('errorId is required');
    }
    if (!ERROR_ID_PATTERN.test(data.errorId)) {
      throw new TypeError(`Malformed error ID: ${data.errorId}`);
    }
    if (!ERROR_REGISTRY.has(data.errorId)) {
      throw new TypeError(`Unknown error ID: ${data.errorId}`);
    }

    const locationStr = data.location
      ? ` at ${data.location.line}:${data.location.column}`
      : '';
    super(`${data.message}${locationStr}`);
    this.name = 'SprigError';
    this.errorId = data.errorId;
    this.location = data.location;
    this.context = data.context;
  }

  /** Get structured error data for custom formatting */
  toData(): SprigErrorData {
    return {
      errorId: this.errorId,
      message: this.message.replace(/ at \d+:\d+$/, ''), // Strip location suffix
      location: this.location,
      context: this.context,
    };
  }

  /** Format error for display (can be overridden by host) */
  format(formatter?: (data: SprigErrorData) => string): string {
    if (formatter) return formatter(this.toData());
    return this.message;
  }
}

// ============================================================
// PARSE ERRORS
// ============================================================

/** Parse-time errors. Collected by the parser, never thrown by it. */
export class ParseError extends SprigError {
  constructor(
    errorId: string,
    message: string,
    location: SourceLocation,
    context?: Record<string, unknown>
  ) {
    const definition = ERROR_REGISTRY.get(errorId);
    if (!definition) {
      throw new TypeError(`Unknown error ID: ${errorId}`);
    }
    if (definition.category !== 'parse') {
      throw new TypeError(`Expected parse error ID, got: ${errorId}`);
    }

    super({ errorId, message, location, context });
    this.name = 'ParseError';
  }
}

// ============================================================
// ERROR FACTORY
// ============================================================

/**
 * Create a ParseError from the registry, rendering the definition's
 * message template with the given context.
 *
 * @throws TypeError if errorId is not found in registry
 *
 * @example
 * createParseError("SPRIG-P002", { token: "ASSIGN" }, location)
 * // ParseError: "no prefix parse function for ASSIGN found at 1:5"
 */
export function createParseError(
  errorId: string,
  context: Record<string, unknown>,
  location: SourceLocation
): ParseError {
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    throw new TypeError(`Unknown error ID: ${errorId}`);
  }

  const message = renderMessage(definition.messageTemplate, context);
  return new ParseError(errorId, message, location, context);
}
