/**
 * Error Registry
 * Central error definition registry with template rendering.
 */

// ============================================================
// ERROR CATEGORIES
// ============================================================

/** Error category determining error ID prefix */
export type ErrorCategory = 'lexer';

/**
 * Example demonstrating an error condition.
 * Used in error documentation to show common scenarios.
 */
export interface ErrorExample {
  /** Description of the example scenario */
  readonly description: string;
  /** Input demonstrating the error */
  readonly code: string;
}

/** Error registry entry containing all metadata for a single error condition */
export interface ErrorDefinition {
  /** Format: EDN-{category}{3-digit} (e.g., EDN-L001) */
  readonly errorId: string;
  readonly category: ErrorCategory;
  /** Human-readable description */
  readonly description: string;
  /** Message template with {placeholder} syntax */
  readonly messageTemplate: string;
  /** What causes this error */
  readonly cause?: string | undefined;
  /** How to resolve this error */
  readonly resolution?: string | undefined;
  readonly examples?: readonly ErrorExample[] | undefined;
}

// ============================================================
// ERROR REGISTRY
// ============================================================

/** Read-only lookup of error definitions by id */
export interface ErrorRegistry {
  get(errorId: string): ErrorDefinition | undefined;
  has(errorId: string): boolean;
  /** Definitions in declaration order */
  definitions(): readonly ErrorDefinition[];
}

function createRegistry(
  definitions: readonly ErrorDefinition[]
): ErrorRegistry {
  const byId = new Map(definitions.map((def) => [def.errorId, def] as const));

  return {
    get: (errorId) => byId.get(errorId),
    has: (errorId) => byId.has(errorId),
    definitions: () => definitions,
  };
}

export const ERROR_IDS = {
  UNEXPECTED_INPUT: 'EDN-L001',
  UNFINISHED_TOKEN: 'EDN-L002',
} as const;

export type ErrorId = (typeof ERROR_IDS)[keyof typeof ERROR_IDS];

const ERROR_DEFINITIONS: readonly ErrorDefinition[] = [
  // Lexer Errors (EDN-L0xx)
  {
    errorId: ERROR_IDS.UNEXPECTED_INPUT,
    category: 'lexer',
    description: 'Unexpected input',
    messageTemplate: 'Unexpected input "{char}"',
    cause:
      'Character is not valid at this point of a token, or starts no token at all.',
    resolution:
      'Remove the character, separate it from the preceding token with whitespace, or quote it inside a string.',
    examples: [
      {
        description: 'Second namespace separator in a symbol',
        code: 'a/b/c',
      },
      {
        description: 'Letter inside a number',
        code: '12x',
      },
      {
        description: 'Character that starts no token',
        code: '@',
      },
    ],
  },
  {
    errorId: ERROR_IDS.UNFINISHED_TOKEN,
    category: 'lexer',
    description: 'Unfinished token',
    messageTemplate: 'Unfinished {type} token "{value}"',
    cause:
      'Input ended, or a separator appeared, before the token was complete.',
    resolution:
      'Close the string, add digits after the decimal point or exponent, or give the keyword a name.',
    examples: [
      {
        description: 'Missing closing quote',
        code: '"hello',
      },
      {
        description: 'Decimal point with no digits after it',
        code: '1.',
      },
      {
        description: 'Bare colon',
        code: ':',
      },
    ],
  },
];

/**
 * Global error registry instance.
 * Read-only singleton initialized at module load.
 */
export const ERROR_REGISTRY: ErrorRegistry =
  createRegistry(ERROR_DEFINITIONS);

// ============================================================
// TEMPLATE RENDERING
// ============================================================

/**
 * Renders a message template by replacing placeholders with context values.
 *
 * Placeholder format: {varName}
 * Missing context values render as empty string.
 * Non-string values are coerced via String().
 * Unclosed braces return the template unchanged.
 *
 * @example
 * renderMessage('Unfinished {type} token "{value}"', {type: 'string', value: 'ab'})
 * // Returns: 'Unfinished string token "ab"'
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
      let j = i + 1;
      while (j < template.length && template.charAt(j) !== '}') {
        j++;
      }

      if (j >= template.length) {
        return template;
      }

      const value = context[template.slice(i + 1, j)];
      if (value !== undefined) {
        result += String(value);
      }

      i = j + 1;
      continue;
    }

    result += char;
    i++;
  }

  return result;
}
