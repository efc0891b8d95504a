/**
 * Parser Helpers
 * Precedence table and literal conversion
 * @internal This module contains internal parser utilities
 */

import type { TokenType } from '../types.js';
import { TOKEN_TYPES } from '../types.js';

// ============================================================
// PRECEDENCE
// ============================================================

/**
 * Binding strength, lowest first. An infix operator parses its right
 * operand at its own level, so operators of equal level group left.
 */
export const PRECEDENCE = {
  LOWEST: 1,
  EQUALS: 2, // ==, !=
  LESSGREATER: 3, // <, >
  SUM: 4, // +, -
  PRODUCT: 5, // *, /
  PREFIX: 6, // -x, !x
  CALL: 7, // f(x)
} as const;

export type Precedence = (typeof PRECEDENCE)[keyof typeof PRECEDENCE];

/** @internal */
export const PRECEDENCES: Readonly<Partial<Record<TokenType, Precedence>>> = {
  [TOKEN_TYPES.EQ]: PRECEDENCE.EQUALS,
  [TOKEN_TYPES.NOT_EQ]: PRECEDENCE.EQUALS,
  [TOKEN_TYPES.LT]: PRECEDENCE.LESSGREATER,
  [TOKEN_TYPES.GT]: PRECEDENCE.LESSGREATER,
  [TOKEN_TYPES.PLUS]: PRECEDENCE.SUM,
  [TOKEN_TYPES.MINUS]: PRECEDENCE.SUM,
  [TOKEN_TYPES.SLASH]: PRECEDENCE.PRODUCT,
  [TOKEN_TYPES.ASTERISK]: PRECEDENCE.PRODUCT,
  [TOKEN_TYPES.LPAREN]: PRECEDENCE.CALL,
};

/**
 * Precedence of a token type; LOWEST for anything that is not an
 * infix operator.
 * @internal
 */
export function precedenceOf(type: TokenType): Precedence {
  return PRECEDENCES[type] ?? PRECEDENCE.LOWEST;
}

// ============================================================
// INTEGER CONVERSION
// ============================================================

/** @internal */
export const INT64_MAX = 9223372036854775807n;

/**
 * Convert literal digit text to a signed 64-bit value.
 *
 * A leading zero marks an octal literal (`010` is 8), so a leading-zero
 * literal holding an 8 or 9 is invalid. Returns null for invalid text and
 * for values above INT64_MAX.
 * @internal
 */
export function parseInt64(text: string): bigint | null {
  let value: bigint;
  if (/^(?:0|[1-9]\d*)$/.test(text)) {
    value = BigInt(text);
  } else if (/^0[0-7]+$/.test(text)) {
    value = BigInt(`0o${text.slice(1)}`);
  } else {
    return null;
  }
  return value > INT64_MAX ? null : value;
}
