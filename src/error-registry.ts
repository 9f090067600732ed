/**
 * Error Registry
 * Central diagnostic definitions with message template rendering.
 */

// ============================================================
// ERROR KINDS
// ============================================================

/** Stage that produced a diagnostic; also the display name of its kind */
export type ErrorKind = 'Scanning' | 'Parsing' | 'Runtime';

/** Registry entry containing all metadata for a single diagnostic */
export interface ErrorDefinition {
  /** Format: LOX-{S|P|R}{3-digit} (e.g., LOX-R001) */
  readonly errorId: string;
  readonly kind: ErrorKind;
  /** Human-readable description */
  readonly description: string;
  /** Message template with {placeholder} syntax */
  readonly messageTemplate: string;
  /** Source snippet that triggers the diagnostic */
  readonly example?: string | undefined;
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
  // Scanning errors (LOX-S0xx)
  {
    errorId: 'LOX-S001',
    kind: 'Scanning',
    description: 'Unexpected character',
    messageTemplate: 'Unexpected character',
    example: 'print 1 @ 2;',
  },
  {
    errorId: 'LOX-S002',
    kind: 'Scanning',
    description: 'Unterminated string literal',
    messageTemplate: 'Unterminated String',
    example: 'print "abc;',
  },

  // Parsing errors (LOX-P0xx)
  {
    errorId: 'LOX-P001',
    kind: 'Parsing',
    description: 'Expected token not found',
    messageTemplate: "Expected '{expected}' {context}, instead found '{found}'",
    example: 'print 1 2;',
  },
  {
    errorId: 'LOX-P002',
    kind: 'Parsing',
    description: 'End of file while expecting a token',
    messageTemplate: "Reached end of file while expecting '{expected}'",
    example: 'print 1',
  },
  {
    errorId: 'LOX-P003',
    kind: 'Parsing',
    description: 'Token cannot start an expression',
    messageTemplate: "Expected value or expression, found '{found}'",
    example: 'print );',
  },
  {
    errorId: 'LOX-P004',
    kind: 'Parsing',
    description: 'Input ended inside an expression',
    messageTemplate: 'Ran out of tokens while satisfying expression rule',
    example: 'print 1 +',
  },
  {
    errorId: 'LOX-P005',
    kind: 'Parsing',
    description: 'Expression nested too deeply',
    messageTemplate: 'Expression nesting exceeds maximum depth of {maxDepth}',
  },

  // Runtime errors (LOX-R0xx)
  {
    errorId: 'LOX-R001',
    kind: 'Runtime',
    description: 'Illegal operand for unary operator',
    messageTemplate: "Illegal operand for unary '{operator}' expression: {operand}",
    example: 'print -"abc";',
  },
  {
    errorId: 'LOX-R002',
    kind: 'Runtime',
    description: 'Illegal operands for binary operator',
    messageTemplate:
      "Illegal operands for binary '{operator}' expression: {left} {operator} {right}",
    example: 'print 1 + true;',
  },
  {
    errorId: 'LOX-R003',
    kind: 'Runtime',
    description: 'Ternary condition is not a boolean',
    messageTemplate: 'Non-boolean condition in ternary: {condition}',
    example: 'print 1 ? 2 : 3;',
  },
  {
    errorId: 'LOX-R004',
    kind: 'Runtime',
    description: 'Variable read before declaration',
    messageTemplate: "Undefined variable '{name}'",
    example: 'print missing;',
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
 * Renders a message template by replacing `{name}` placeholders with
 * context values. Missing values render as empty string. An unclosed
 * brace returns the template unchanged.
 *
 * @example
 * renderMessage("Undefined variable '{name}'", { name: 'x' })
 * // Returns: "Undefined variable 'x'"
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
