/**
 * Error Registry
 * Central error definition registry with template rendering.
 */

// ============================================================
// ERROR CATEGORIES
// ============================================================

/** Error category determining error ID prefix */
export type ErrorCategory = 'lexer' | 'config';

/**
 * Example demonstrating an error condition.
 * Rendered by `kite-lex --explain`.
 */
export interface ErrorExample {
  /** Description of the example scenario */
  readonly description: string;
  /** Source text that triggers the error */
  readonly code: string;
}

/** Error registry entry containing all metadata for a single error condition */
export interface ErrorDefinition {
  /** Format: KITE-{category letter}{3-digit} (e.g., KITE-L001) */
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

  constructor(definitions: readonly ErrorDefinition[]) {
    const idMap = new Map<string, ErrorDefinition>();

    for (const def of definitions) {
      if (idMap.has(def.errorId)) {
        throw new TypeError(`Duplicate error ID: ${def.errorId}`);
      }
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

const ERROR_DEFINITIONS: readonly ErrorDefinition[] = [
  // Lexer Errors (KITE-L0xx)
  {
    errorId: 'KITE-L001',
    category: 'lexer',
    description: 'Integer literal out of range',
    messageTemplate: 'Integer literal {value} exceeds {max}',
    cause:
      'Integer literals are 64-bit signed values; the digits spell a larger number.',
    resolution: 'Use a value no larger than 9223372036854775807.',
    examples: [
      {
        description: 'One past the largest 64-bit integer',
        code: 'let big = 9223372036854775808;',
      },
    ],
  },
  {
    errorId: 'KITE-L002',
    category: 'lexer',
    description: 'Illegal character',
    messageTemplate: 'Illegal character {char}',
    cause: 'Character is not part of Kite syntax.',
    resolution:
      'Remove or replace the character. Strings, comments and floating-point numbers are not supported.',
    examples: [
      {
        description: 'String literal',
        code: 'let name = "kite";',
      },
      {
        description: 'Decorator-like prefix',
        code: '@let x = 1;',
      },
    ],
  },

  // Configuration Errors (KITE-C0xx)
  {
    errorId: 'KITE-C001',
    category: 'config',
    description: 'Invalid configuration',
    messageTemplate: 'Invalid configuration: {reason}',
    cause:
      'The .kite-lex.yaml file is not valid YAML or has a field of the wrong type.',
    resolution:
      'Keep to the fields prompt (string), spans (boolean) and format (human or compact), or delete the file to use the defaults.',
    examples: [
      {
        description: 'Boolean field given a string',
        code: 'spans: sometimes',
      },
    ],
  },
];

export const ERROR_REGISTRY: ErrorRegistry = new ErrorRegistryImpl(
  ERROR_DEFINITIONS
);

// ============================================================
// MESSAGE RENDERING
// ============================================================

/**
 * Render a message template, replacing `{name}` placeholders with values
 * from `context`.
 *
 * Missing values render as an empty string. `{{` renders a literal `{`.
 * An unclosed `{` leaves the template unchanged.
 *
 * @example
 * renderMessage('Illegal character {char}', { char: '@' })
 * // Returns: "Illegal character @"
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
      if (template.charAt(i + 1) === '{') {
        result += '{';
        i += 2;
        continue;
      }

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
