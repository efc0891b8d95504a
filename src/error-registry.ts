/**
 * Error Registry
 * Central error definition registry with template rendering.
 */

// ============================================================
// ERROR CATEGORIES
// ============================================================

/** Error category determining error ID prefix */
export type ErrorCategory = 'parse';

/**
 * Example demonstrating an error condition.
 * Used by `sprig --explain` to show common scenarios.
 */
export interface ErrorExample {
  readonly description: string;
  readonly code: string;
}

/** Error registry entry containing all metadata for a single error condition */
export interface ErrorDefinition {
  /** Format: SPRIG-{category letter}{3-digit} (e.g., SPRIG-P001) */
  readonly errorId: string;
  readonly category: ErrorCategory;
  /** Human-readable description (max 50 characters) */
  readonly description: string;
  /** Message template with {placeholder} syntax */
  readonly messageTemplate: string;
  readonly cause?: string | undefined;
  readonly resolution?: string | undefined;
  readonly examples?: ErrorExample[] | undefined;
}

// ============================================================
// ERROR REGISTRY
// ============================================================

/**
 * Lookup of error definitions by ID.
 * Immutable after initialization.
 */
export interface ErrorRegistry {
  get(errorId: string): ErrorDefinition | undefined;
  has(errorId: string): boolean;
  readonly size: number;
  entries(): IterableIterator<[string, ErrorDefinition]>;
}

class ErrorRegistryImpl implements ErrorRegistry {
  private readonly byId: ReadonlyMap<string, ErrorDefinition>;

  constructor(definitions: ErrorDefinition[]) {
    this.byId = new Map(definitions.map((def) => [def.errorId, def]));
  }

  get(errorId: string): ErrorDefinition | undefined {
    return this.byId.get(errorId);
  }

  has(errorId: string): boolean {
    return this.byId.has(errorId);
  }

  get size(): number {
    return this.byId.size;
  }

  entries(): IterableIterator<[string, ErrorDefinition]> {
    return this.byId.entries();
  }
}

const ERROR_DEFINITIONS: ErrorDefinition[] = [
  // Parse Errors (SPRIG-P0xx)
  {
    errorId: 'SPRIG-P001',
    category: 'parse',
    description: 'Unexpected token',
    messageTemplate: 'expected next token to be {expected}, got {actual} instead',
    cause:
      'A construct requires a specific token next (an identifier after let, a closing parenthesis, a brace) and found another.',
    resolution:
      'Check the construct at the indicated position for a missing name, operator or delimiter.',
    examples: [
      {
        description: 'let without a name',
        code: 'let = 5;',
      },
      {
        description: 'Unclosed group',
        code: '(1 + 2',
      },
      {
        description: 'Unclosed block',
        code: 'if (x) { x',
      },
    ],
  },
  {
    errorId: 'SPRIG-P002',
    category: 'parse',
    description: 'Token cannot start an expression',
    messageTemplate: 'no prefix parse function for {token} found',
    cause:
      'An expression was expected but the token found cannot begin one, such as an operator with no left operand or an illegal character.',
    resolution:
      'Supply the missing operand, or remove the stray token or character.',
    examples: [
      {
        description: 'Operator with no left operand',
        code: '* 5',
      },
      {
        description: 'Character outside the language',
        code: 'let x = 5 @ 2;',
      },
    ],
  },
  {
    errorId: 'SPRIG-P003',
    category: 'parse',
    description: 'Invalid integer literal',
    messageTemplate: 'could not parse {literal} as integer',
    cause:
      'Integer literal lies outside the signed 64-bit range, or starts with 0 (octal) and contains the digit 8 or 9.',
    resolution:
      'Use a value no greater than 9223372036854775807, and drop the leading zero from decimal literals.',
    examples: [
      {
        description: 'One past the largest integer',
        code: '9223372036854775808',
      },
      {
        description: 'Digit 9 in an octal literal',
        code: '09',
      },
    ],
  },
];

/**
 * Global error registry instance.
 * Read-only singleton initialized at module load.
 */
export const ERROR_REGISTRY: ErrorRegistry = new ErrorRegistryImpl(
  ERROR_DEFINITIONS
);

/** Shape of a valid error ID */
export const ERROR_ID_PATTERN = /^SPRIG-P\d{3}$/;

// ============================================================
// TEMPLATE RENDERING
// ============================================================

/**
 * Renders a message template by replacing placeholders with context values.
 *
 * Placeholder format: {varName}. Missing context values render as an empty
 * string and non-string values are coerced via String(). A template with an
 * unclosed brace is returned unchanged.
 *
 * @example
 * renderMessage("expected {expected}, got {actual}", { expected: "IDENT", actual: "ASSIGN" })
 * // Returns: "expected IDENT, got ASSIGN"
 */
export function renderMessage(
  template: string,
  context: Record<string, unknown>
): string {
  let result = '';
  let i = 0;

  while (i < template.length) {
    const char = template.charAt(i);

    if (char === '{') {
      const close = template.indexOf('}', i + 1);
      if (close === -1) {
        return template;
      }

      const value = context[template.slice(i + 1, close)];
      if (value !== undefined) {
        result += String(value);
      }

      i = close + 1;
      continue;
    }

    result += char;
    i++;
  }

  return result;
}
