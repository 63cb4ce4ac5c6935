/**
 * Error Registry
 * Central error definition registry with template rendering.
 */

// ============================================================
// ERROR CATEGORIES
// ============================================================

/** Error category determining error ID prefix */
export type ErrorCategory = 'tracker' | 'pattern';

/** Error registry entry containing all metadata for a single error condition */
export interface ErrorDefinition {
  /** Format: SCAN-{category}{3-digit} (e.g., SCAN-T001) */
  readonly errorId: string;
  /** Error category (determines ID prefix) */
  readonly category: ErrorCategory;
  /** Human-readable description (max 50 characters) */
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
  // Tracker Errors (SCAN-T0xx)
  {
    errorId: 'SCAN-T001',
    category: 'tracker',
    description: 'No saved column to restore',
    messageTemplate:
      'Cannot move back over a newline at row {row}: no saved column',
    cause:
      'backward() received a newline that no prior forward() recorded since the last validate().',
    resolution:
      'Only call backward() with the code points forward() consumed, in reverse order, and never across a commit.',
  },
  {
    errorId: 'SCAN-T002',
    category: 'tracker',
    description: 'Tracker counter underflow',
    messageTemplate: 'Cannot move {counter} back by {amount} from {value}',
    cause: 'backward() was called for more text than forward() consumed.',
    resolution:
      'Pair every backward() with a matching earlier forward() on the same tracker.',
  },

  // Pattern Errors (SCAN-P0xx)
  {
    errorId: 'SCAN-P001',
    category: 'pattern',
    description: 'Pattern offset is not a boundary',
    messageTemplate:
      'Pattern returned offset {offset}, which is not a code point boundary in text of length {length}',
    cause:
      'A Matcher returned an offset outside the searched text or inside a surrogate pair.',
    resolution:
      'Return a unit offset between 0 and text.length that does not split a surrogate pair, or undefined for no match.',
  },
  {
    errorId: 'SCAN-P002',
    category: 'pattern',
    description: 'Pattern code point out of range',
    messageTemplate:
      'Pattern code point {value} is not an integer between 0 and 0x10FFFF',
    cause: 'A number pattern does not name a Unicode code point.',
    resolution:
      'Pass an integer code point value, or the code point as a string.',
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
 * renderMessage("Cannot move {counter} back", { counter: "bytes" })
 * // Returns: "Cannot move bytes back"
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
