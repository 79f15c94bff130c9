/**
 * Error Registry
 * Central error definition registry with template rendering.
 */

// ============================================================
// ERROR CATEGORIES
// ============================================================

/** Error category determining error ID prefix */
export type ErrorCategory = 'parse' | 'compile';

/** Error registry entry containing all metadata for a single error condition */
export interface ErrorDefinition {
  /** Format: COMP-{category}{3-digit} (e.g., COMP-P001) */
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

/** All error definitions indexed by error ID */
const ERROR_DEFINITIONS: ErrorDefinition[] = [
  // Scanner errors surface as parse errors (COMP-P00x)
  {
    errorId: 'COMP-P001',
    category: 'parse',
    description: 'Unterminated string literal',
    messageTemplate: 'Unterminated string literal',
    cause: 'A quote opened a string that was not closed before end of line.',
    resolution: 'Close the string, or escape the line break with a backslash.',
  },
  {
    errorId: 'COMP-P002',
    category: 'parse',
    description: 'Unterminated comment',
    messageTemplate: 'Unterminated block comment',
    cause: 'A /* comment has no matching */.',
  },
  {
    errorId: 'COMP-P003',
    category: 'parse',
    description: 'Unterminated regular expression',
    messageTemplate: 'Unterminated regular expression literal',
    cause:
      'A slash in operand position starts a regular expression that never closes.',
    resolution: 'Close the regular expression, or parenthesize a division.',
  },
  {
    errorId: 'COMP-P004',
    category: 'parse',
    description: 'Unterminated template literal',
    messageTemplate: 'Unterminated template literal',
  },
  {
    errorId: 'COMP-P005',
    category: 'parse',
    description: 'Unclosed bracket',
    messageTemplate: "Unclosed '{bracket}'",
    resolution: 'Add the matching closing bracket.',
  },
  {
    errorId: 'COMP-P006',
    category: 'parse',
    description: 'Mismatched bracket',
    messageTemplate: "Expected '{expected}' to close '{open}', found '{found}'",
  },
  // Grammar errors (COMP-P01x)
  {
    errorId: 'COMP-P010',
    category: 'parse',
    description: 'Missing expression',
    messageTemplate: 'Missing {what}',
    cause: 'An expression list is empty or ends with a comma.',
  },
  {
    errorId: 'COMP-P011',
    category: 'parse',
    description: 'Missing for clause',
    messageTemplate: "Missing 'for' clause",
    cause: 'Every comprehension binds at least one variable with for.',
    resolution: "Add a clause such as 'for x'.",
  },
  {
    errorId: 'COMP-P012',
    category: 'parse',
    description: 'Missing clause variables',
    messageTemplate: "Expected variable name after '{keyword}'",
  },
  {
    errorId: 'COMP-P013',
    category: 'parse',
    description: 'Reserved identifier prefix',
    messageTemplate: "Identifier '{name}' may not start with the {prefix} prefix",
    cause: 'Names starting with the reserved prefix belong to generated code.',
    resolution: 'Rename the variable.',
  },
  {
    errorId: 'COMP-P014',
    category: 'parse',
    description: 'Reserved word as variable',
    messageTemplate: "'{name}' is a reserved word and cannot be bound",
  },
  {
    errorId: 'COMP-P015',
    category: 'parse',
    description: 'Wrong numeric range arity',
    messageTemplate:
      'Numeric for requires 2 or 3 expressions, found {count}',
    resolution: "Write 'for x = start, stop' or 'for x = start, stop, step'.",
  },
  {
    errorId: 'COMP-P016',
    category: 'parse',
    description: 'Wrong clause variable count',
    messageTemplate: '{kind} for clause binds exactly one variable, found {count}',
    resolution: "Use 'in' to bind several variables from an iterable.",
  },
  {
    errorId: 'COMP-P017',
    category: 'parse',
    description: 'Unknown fold operator',
    messageTemplate: "Unknown fold operator '{name}'",
    resolution: 'Use one of list, table, sum, min, max.',
  },
  {
    errorId: 'COMP-P018',
    category: 'parse',
    description: 'Wrong output arity',
    messageTemplate: "'{operator}' takes {expected} output expression{plural}, found {count}",
  },
  {
    errorId: 'COMP-P019',
    category: 'parse',
    description: 'Unrecognized trailing input',
    messageTemplate: 'Unrecognized input: {remainder}',
  },
  // Compile errors (COMP-C0xx)
  {
    errorId: 'COMP-C001',
    category: 'compile',
    description: 'Generated code failed to compile',
    messageTemplate: '{diagnostic} with generated code {source}',
    cause:
      'An embedded expression is not valid JavaScript, or the generator emitted invalid code.',
  },
];

export const ERROR_REGISTRY: ErrorRegistry = new ErrorRegistryImpl(
  ERROR_DEFINITIONS
);

// ============================================================
// TEMPLATE RENDERING
// ============================================================

/**
 * Renders a message template by replacing {placeholder} tokens with
 * values from context. Missing keys render as empty strings; an unclosed
 * brace returns the template unchanged.
 *
 * @example
 * renderMessage("Unknown fold operator '{name}'", { name: "avg" })
 * // Returns: "Unknown fold operator 'avg'"
 */
export function renderMessage(
  template: string,
  context: Record<string, unknown>
): string {
  let result = '';
  let i = 0;

  while (i < template.length) {
    const char = template[i] ?? '';

    if (char === '{' && template[i + 1] !== '{') {
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
