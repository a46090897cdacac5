/**
 * Error Registry
 * Definitions of the library's own errors, with template rendering.
 */

// ============================================================
// ERROR CATEGORIES
// ============================================================

/**
 * Error category determining error ID prefix.
 * - validation (V): a checked value failed a test
 * - usage (U): the check API was called incorrectly
 * - registry (R): the formatter registry was wired incorrectly
 */
export type ErrorCategory = 'validation' | 'usage' | 'registry';

/** Error registry entry containing all metadata for a single error condition */
export interface ErrorDefinition {
  /** Format: VOUCH-{category}{3-digit} (e.g., VOUCH-U001) */
  readonly errorId: string;
  readonly category: ErrorCategory;
  /** Human-readable description (max 50 characters) */
  readonly description: string;
  /** Message template with {placeholder} syntax */
  readonly messageTemplate: string;
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
  getByCategory(category: ErrorCategory): ErrorDefinition[];
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

  getByCategory(category: ErrorCategory): ErrorDefinition[] {
    return [...this.byId.values()].filter((def) => def.category === category);
  }

  get size(): number {
    return this.byId.size;
  }

  entries(): IterableIterator<[string, ErrorDefinition]> {
    return this.byId.entries();
  }
}

const ERROR_DEFINITIONS: ErrorDefinition[] = [
  // Validation failures (VOUCH-V0xx)
  {
    errorId: 'VOUCH-V001',
    category: 'validation',
    description: 'Argument validation failed',
    messageTemplate: '{message}',
  },
  {
    errorId: 'VOUCH-V002',
    category: 'validation',
    description: 'Illegal state',
    messageTemplate: '{message}',
  },

  // API misuse (VOUCH-U0xx)
  {
    errorId: 'VOUCH-U001',
    category: 'usage',
    description: 'Invalid custom message',
    messageTemplate: 'Custom message must be a string (was {actual})',
  },
  {
    errorId: 'VOUCH-U002',
    category: 'usage',
    description: 'Test not applicable',
    messageTemplate: '{test} is not applicable to values of type {type}',
  },
  {
    errorId: 'VOUCH-U003',
    category: 'usage',
    description: 'No conditions',
    messageTemplate: 'given() requires at least one condition',
  },

  // Registry wiring (VOUCH-R0xx)
  {
    errorId: 'VOUCH-R001',
    category: 'registry',
    description: 'Self-complementary test',
    messageTemplate: 'Test {test} cannot be its own complement',
  },
  {
    errorId: 'VOUCH-R002',
    category: 'registry',
    description: 'Test paired twice',
    messageTemplate: 'Test {test} appears in more than one complementary pair',
  },
  {
    errorId: 'VOUCH-R003',
    category: 'registry',
    description: 'Pair without formatter',
    messageTemplate:
      'Complementary pair ({first}, {second}) references a test without a formatter',
  },
  {
    errorId: 'VOUCH-R004',
    category: 'registry',
    description: 'Duplicate formatter',
    messageTemplate: 'Test {test} is registered more than once',
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
 * This is the syntax of the library's own error definitions. Caller-supplied
 * failure messages use the `${name}` syntax of `formatTemplate` instead.
 *
 * @example
 * renderMessage("Test {test} is registered more than once", {test: "gt()"})
 * // Returns: "Test gt() is registered more than once"
 */
export function renderMessage(
  template: string,
  context: Record<string, unknown>
): string {
  let result = '';
  let i = 0;

  while (i < template.length) {
    const char = template.charAt(i);

    if (char === '{' && template.charAt(i + 1) !== '{') {
      let j = i + 1;
      while (j < template.length && template.charAt(j) !== '}') {
        j++;
      }

      if (j >= template.length) {
        // Unclosed brace
        return template;
      }

      const value = context[template.slice(i + 1, j)];
      if (value !== undefined) {
        result += coerce(value);
      }

      i = j + 1;
      continue;
    }

    result += char;
    i++;
  }

  return result;
}

function coerce(value: unknown): string {
  try {
    return String(value);
  } catch {
    // Null-prototype objects have no toString
    return Object.prototype.toString.call(value);
  }
}
