/**
 * Error Registry
 * Central error definition registry with template rendering.
 */

// ============================================================
// ERROR CATEGORIES
// ============================================================

/** Error category determining error ID prefix */
export type ErrorCategory = 'conversion';

/** Error registry entry containing all metadata for a single error condition */
export interface ErrorDefinition {
  /** Format: ARMA-{category}{3-digit} (e.g., ARMA-C001) */
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
 * Registry of all error definitions with O(1) lookup.
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
  // Conversion Errors (ARMA-C0xx)
  {
    errorId: 'ARMA-C001',
    category: 'conversion',
    description: 'Empty numeric argument',
    messageTemplate: 'cannot parse {kind} from empty string',
  },
  {
    errorId: 'ARMA-C002',
    category: 'conversion',
    description: 'Invalid digit in integer',
    messageTemplate: 'invalid digit found in string',
  },
  {
    errorId: 'ARMA-C003',
    category: 'conversion',
    description: 'Integer above range',
    messageTemplate: 'number too large to fit in target type',
  },
  {
    errorId: 'ARMA-C004',
    category: 'conversion',
    description: 'Integer below range',
    messageTemplate: 'number too small to fit in target type',
  },
  {
    errorId: 'ARMA-C005',
    category: 'conversion',
    description: 'Invalid float literal',
    messageTemplate: 'invalid float literal',
  },
  {
    errorId: 'ARMA-C006',
    category: 'conversion',
    description: 'Invalid boolean literal',
    messageTemplate: 'provided string was not `true` or `false`',
  },
  {
    errorId: 'ARMA-C007',
    category: 'conversion',
    description: 'Argument count mismatch',
    messageTemplate: 'Expected {expectedCount} arguments, got {actualCount}',
  },
  {
    errorId: 'ARMA-C008',
    category: 'conversion',
    description: 'Argument conversion failed',
    messageTemplate: 'Argument {index} ({typeName}): {reason}',
  },
];

export const ERROR_REGISTRY: ErrorRegistry = new ErrorRegistryImpl(
  ERROR_DEFINITIONS
);

// ============================================================
// TEMPLATE RENDERING
// ============================================================

/**
 * Renders a message template by replacing {placeholder} with context values.
 *
 * Missing keys render as empty text. Non-string values are coerced with String().
 * An unclosed brace leaves the template unchanged.
 *
 * @example
 * renderMessage("Expected {expectedCount} arguments", { expectedCount: 2 })
 * // Returns: "Expected 2 arguments"
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
        try {
          result += String(value);
        } catch {
          result += Object.prototype.toString.call(value);
        }
      }

      i = close + 1;
      continue;
    }

    result += char;
    i++;
  }

  return result;
}
