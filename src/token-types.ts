// ============================================================
// SOURCE LOCATION
// ============================================================

export interface SourceLocation {
  readonly line: number;
  readonly column: number;
  /** 0-based index into the source text */
  readonly offset: number;
}

export interface SourceSpan {
  readonly start: SourceLocation;
  readonly end: SourceLocation;
}

// ============================================================
// TOKEN TYPES
// ============================================================

export const TOKEN_TYPES = {
  // Special
  ILLEGAL: 'ILLEGAL',
  EOF: 'EOF',

  // Identifiers and literals
  IDENT: 'IDENT', // add, foobar, x
  INT: 'INT', // 1234

  // Operators
  ASSIGN: 'ASSIGN', // =
  PLUS: 'PLUS', // +
  MINUS: 'MINUS', // -
  BANG: 'BANG', // !
  ASTERISK: 'ASTERISK', // *
  SLASH: 'SLASH', // /

  // Comparison operators
  LT: 'LT', // <
  GT: 'GT', // >
  EQ: 'EQ', // ==
  NOT_EQ: 'NOT_EQ', // !=

  // Delimiters
  COMMA: 'COMMA', // ,
  SEMICOLON: 'SEMICOLON', // ;
  LPAREN: 'LPAREN', // (
  RPAREN: 'RPAREN', // )
  LBRACE: 'LBRACE', // {
  RBRACE: 'RBRACE', // }

  // Keywords
  FUNCTION: 'FUNCTION', // fn
  LET: 'LET',
  TRUE: 'TRUE',
  FALSE: 'FALSE',
  IF: 'IF',
  ELSE: 'ELSE',
  RETURN: 'RETURN',
} as const;

export type TokenType = (typeof TOKEN_TYPES)[keyof typeof TOKEN_TYPES];

export interface Token {
  readonly type: TokenType;
  /** Literal source text; empty for EOF */
  readonly value: string;
  readonly span: SourceSpan;
}
