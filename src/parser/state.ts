/**
 * Parser State
 * Parse session: token window, collected errors and callbacks
 */

import { nextToken, type LexerState } from '../lexer/index.js';
import type { Token, TokenType } from '../types.js';
import { createParseError, type ParseError } from '../types.js';

// ============================================================
// CALLBACKS
// ============================================================

/** Emitted when a parse rule is entered or left */
export interface TraceEvent {
  readonly phase: 'enter' | 'exit';
  /** Parse rule name, e.g. "parseExpression" */
  readonly rule: string;
  /** Nesting depth; 0 for the outermost rule */
  readonly depth: number;
  /** Current token when the event fired */
  readonly token: Token;
}

/** Optional hooks for observing a parse */
export interface ParseCallbacks {
  /** Called on entry to and exit from every parse rule */
  onTrace?: (event: TraceEvent) => void;
  /** Called each time an error is recorded */
  onError?: (error: ParseError) => void;
}

// ============================================================
// PARSER STATE
// ============================================================

export interface ParserState {
  readonly lexer: LexerState;
  current: Token;
  /** One-token lookahead */
  peekToken: Token;
  /** Errors in the order they were recorded */
  readonly errors: ParseError[];
  readonly callbacks: ParseCallbacks;
  traceDepth: number;
}

/**
 * Create a parse session over a lexer. Pulls two tokens so that both
 * current and peekToken are set before any rule runs.
 */
export function createParserState(
  lexer: LexerState,
  callbacks: ParseCallbacks = {}
): ParserState {
  const current = nextToken(lexer);
  const peekToken = nextToken(lexer);
  return {
    lexer,
    current,
    peekToken,
    errors: [],
    callbacks,
    traceDepth: 0,
  };
}

// ============================================================
// TOKEN NAVIGATION
// ============================================================

/** @internal */
export function advance(state: ParserState): void {
  state.current = state.peekToken;
  state.peekToken = nextToken(state.lexer);
}

/** @internal */
export function currentIs(state: ParserState, type: TokenType): boolean {
  return state.current.type === type;
}

/** @internal */
export function peekIs(state: ParserState, type: TokenType): boolean {
  return state.peekToken.type === type;
}

/**
 * Advance when the lookahead token has the given type. Otherwise record an
 * error and leave the position unchanged; the caller abandons its construct.
 * @internal
 */
export function expectPeek(state: ParserState, type: TokenType): boolean {
  if (peekIs(state, type)) {
    advance(state);
    return true;
  }
  recordError(
    state,
    createParseError(
      'SPRIG-P001',
      { expected: type, actual: state.peekToken.type },
      state.peekToken.span.start
    )
  );
  return false;
}

// ============================================================
// ERRORS
// ============================================================

/** @internal */
export function recordError(state: ParserState, error: ParseError): void {
  state.errors.push(error);
  state.callbacks.onError?.(error);
}

// ============================================================
// TRACING
// ============================================================

/**
 * Run a parse rule, reporting entry and exit through onTrace.
 * @internal
 */
export function traceRule<T>(
  state: ParserState,
  rule: string,
  body: () => T
): T {
  const onTrace = state.callbacks.onTrace;
  if (!onTrace) return body();

  onTrace({ phase: 'enter', rule, depth: state.traceDepth, token: state.current });
  state.traceDepth++;
  try {
    return body();
  } finally {
    state.traceDepth--;
    onTrace({ phase: 'exit', rule, depth: state.traceDepth, token: state.current });
  }
}
