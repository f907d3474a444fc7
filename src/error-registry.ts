/**
 * Error Registry
 * Central error definition registry with template rendering.
 */

// ============================================================
// ERROR CATEGORIES
// ============================================================

/** Error category determining error ID prefix */
export type ErrorCategory = 'lexer' | 'parse' | 'internal';

/** Error registry entry containing all metadata for a single error condition */
export interface ErrorDefinition {
  /** Format: SPRIG-{category}{3-digit} (e.g., SPRIG-P001) */
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
}

// ============================================================
// ERROR REGISTRY
// ============================================================

/**
 * Central registry for all error definitions with O(1) lookup.
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
    const idMap = new Map<string, ErrorDefinition>();

    for (const def of definitions) {
      idMap.set(def.errorId, def);
    }

    this.byId = idMap;
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
  // Lexer Errors (SPRIG-L0xx)
  {
    errorId: 'SPRIG-L001',
    category: 'lexer',
    description: 'Unexpected character',
    messageTemplate: "Unexpected character '{char}' (position {position})",
    cause: 'No token starts with this character.',
    resolution:
      'Remove the character, or quote it inside a string literal ("...").',
  },

  // Parse Errors (SPRIG-P0xx)
  {
    errorId: 'SPRIG-P001',
    category: 'parse',
    description: 'Unexpected token',
    messageTemplate: 'Unexpected token {found}, expected {expected}',
    cause: 'Token appears in a position the grammar does not allow.',
    resolution: 'Check for a missing ; or an unbalanced delimiter.',
  },
  {
    errorId: 'SPRIG-P002',
    category: 'parse',
    description: 'Unexpected end of input',
    messageTemplate: 'Unexpected end of input, expected {expected}',
    cause: 'Source ended before the current statement was complete.',
    resolution: 'Terminate the statement with ; and close every { and (.',
  },
  {
    errorId: 'SPRIG-P003',
    category: 'parse',
    description: 'Expected expression',
    messageTemplate: 'Unexpected token {found}, expected expression',
    cause: 'Token cannot start an expression.',
    resolution: 'Start the expression with a number, a string or (.',
  },
  {
    errorId: 'SPRIG-P004',
    category: 'parse',
    description: 'Nesting too deep',
    messageTemplate: 'Maximum nesting depth of {maxDepth} exceeded',
    cause: 'Blocks or parentheses nest deeper than the maxDepth option.',
    resolution: 'Flatten the source or raise maxDepth.',
  },

  // Internal Errors (SPRIG-I0xx)
  {
    errorId: 'SPRIG-I001',
    category: 'internal',
    description: 'Unexpected literal production',
    messageTemplate: 'Literal: unexpected literal production {found}',
    cause:
      'The literal rule was entered with a token that is neither a number nor a string.',
    resolution: 'Dispatch through parsePrimary before calling parseLiteral.',
  },
  {
    errorId: 'SPRIG-I002',
    category: 'internal',
    description: 'Unknown operator',
    messageTemplate: 'Unknown operator {found}, expected {expected}',
    cause: 'An operator token carries text outside its operator class.',
    resolution: 'Build operator tokens only through the tokenizer.',
  },
];

/**
 * Global error registry instance.
 * Read-only singleton initialized at module load.
 */
export const ERROR_REGISTRY: ErrorRegistry = new ErrorRegistryImpl(
  ERROR_DEFINITIONS
);

// ============================================================
// TEMPLATE RENDERING
// ============================================================

/**
 * Renders a message template by replacing placeholders with context values.
 *
 * Placeholder format: {varName}
 * Missing context values render as empty string.
 * Non-string values are coerced via String().
 * Invalid templates (unclosed braces) return template unchanged.
 *
 * @example
 * renderMessage("Expected {expected}, got {found}", {expected: ";", found: "}"})
 * // Returns: "Expected ;, got }"
 */
export function renderMessage(
  template: string,
  context: Record<string, unknown>
): string {
  let result = '';
  let i = 0;

  while (i < template.length) {
    const char = template[i] ?? '';

    if (char === '{') {
      let j = i + 1;
      while (j < template.length && template[j] !== '}') {
        j++;
      }

      // Unclosed brace
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
