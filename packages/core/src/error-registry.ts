/**
 * Error Registry
 * Central error definition registry with template rendering.
 */

// ============================================================
// ERROR CATEGORIES
// ============================================================

/** Error category determining error ID prefix */
export type ErrorCategory = 'scan' | 'parse' | 'runtime';

/** Error registry entry containing all metadata for a single error condition */
export interface ErrorDefinition {
  /** Format: LOX-{S|P|R}{3-digit} (e.g., LOX-R001) */
  readonly errorId: string;
  readonly category: ErrorCategory;
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
  readonly size: number;
  entries(): IterableIterator<[string, ErrorDefinition]>;
}

class ErrorRegistryImpl implements ErrorRegistry {
  private readonly byId: ReadonlyMap<string, ErrorDefinition>;

  constructor(definitions: readonly ErrorDefinition[]) {
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

/** Stable identifiers for every diagnostic the pipeline can produce */
export const LOX_ERROR_CODES = {
  SCAN_UNEXPECTED_CHARACTER: 'LOX-S001',
  SCAN_INVALID_NUMBER: 'LOX-S002',
  SCAN_UNTERMINATED_STRING: 'LOX-S003',

  PARSE_EXPECTED_EXPRESSION: 'LOX-P001',
  PARSE_EXPECTED_RPAREN: 'LOX-P002',
  PARSE_EXPECTED_SEMICOLON: 'LOX-P003',
  PARSE_EXPECTED_VARIABLE_NAME: 'LOX-P004',
  PARSE_EXPECTED_EQUAL: 'LOX-P005',
  PARSE_NESTING_TOO_DEEP: 'LOX-P006',

  RUNTIME_UNDEFINED_VARIABLE: 'LOX-R001',
  RUNTIME_COMPARE_TYPE: 'LOX-R002',
  RUNTIME_ADD_TYPE: 'LOX-R003',
  RUNTIME_SUBTRACT_TYPE: 'LOX-R004',
  RUNTIME_DIVIDE_TYPE: 'LOX-R005',
  RUNTIME_MULTIPLY_TYPE: 'LOX-R006',
  RUNTIME_NEGATE_TYPE: 'LOX-R007',
  RUNTIME_INVERT_TYPE: 'LOX-R008',
  RUNTIME_NESTING_TOO_DEEP: 'LOX-R009',
} as const;

export type LoxErrorCode =
  (typeof LOX_ERROR_CODES)[keyof typeof LOX_ERROR_CODES];

const ERROR_DEFINITIONS: ErrorDefinition[] = [
  // Scan Errors (LOX-S0xx)
  {
    errorId: LOX_ERROR_CODES.SCAN_UNEXPECTED_CHARACTER,
    category: 'scan',
    messageTemplate: 'unexpected character: {char}',
  },
  {
    errorId: LOX_ERROR_CODES.SCAN_INVALID_NUMBER,
    category: 'scan',
    messageTemplate: 'invalid number literal: {lexeme}',
  },
  {
    errorId: LOX_ERROR_CODES.SCAN_UNTERMINATED_STRING,
    category: 'scan',
    messageTemplate: 'unterminated string',
  },

  // Parse Errors (LOX-P0xx)
  {
    errorId: LOX_ERROR_CODES.PARSE_EXPECTED_EXPRESSION,
    category: 'parse',
    messageTemplate: 'expected expression, found {found}',
  },
  {
    errorId: LOX_ERROR_CODES.PARSE_EXPECTED_RPAREN,
    category: 'parse',
    messageTemplate: "expected ')' after expression, found {found}",
  },
  {
    errorId: LOX_ERROR_CODES.PARSE_EXPECTED_SEMICOLON,
    category: 'parse',
    messageTemplate: "expected ';' after {statement}, found {found}",
  },
  {
    errorId: LOX_ERROR_CODES.PARSE_EXPECTED_VARIABLE_NAME,
    category: 'parse',
    messageTemplate: 'expected variable name, found {found}',
  },
  {
    errorId: LOX_ERROR_CODES.PARSE_EXPECTED_EQUAL,
    category: 'parse',
    messageTemplate: "expected '=' after variable name, found {found}",
  },
  {
    errorId: LOX_ERROR_CODES.PARSE_NESTING_TOO_DEEP,
    category: 'parse',
    messageTemplate: 'expression nested too deeply (more than {limit} levels)',
  },

  // Runtime Errors (LOX-R0xx)
  {
    errorId: LOX_ERROR_CODES.RUNTIME_UNDEFINED_VARIABLE,
    category: 'runtime',
    messageTemplate: 'undefined variable: {name}',
  },
  {
    errorId: LOX_ERROR_CODES.RUNTIME_COMPARE_TYPE,
    category: 'runtime',
    messageTemplate: 'can only compare numbers',
  },
  {
    errorId: LOX_ERROR_CODES.RUNTIME_ADD_TYPE,
    category: 'runtime',
    messageTemplate: 'can only add numbers or strings',
  },
  {
    errorId: LOX_ERROR_CODES.RUNTIME_SUBTRACT_TYPE,
    category: 'runtime',
    messageTemplate: 'can only subtract numbers',
  },
  {
    errorId: LOX_ERROR_CODES.RUNTIME_DIVIDE_TYPE,
    category: 'runtime',
    messageTemplate: 'can only divide numbers',
  },
  {
    errorId: LOX_ERROR_CODES.RUNTIME_MULTIPLY_TYPE,
    category: 'runtime',
    messageTemplate: 'can only multiply numbers',
  },
  {
    errorId: LOX_ERROR_CODES.RUNTIME_NEGATE_TYPE,
    category: 'runtime',
    messageTemplate: '- can only be applied to numbers',
  },
  {
    errorId: LOX_ERROR_CODES.RUNTIME_INVERT_TYPE,
    category: 'runtime',
    messageTemplate: '! can only be applied to booleans',
  },
  {
    errorId: LOX_ERROR_CODES.RUNTIME_NESTING_TOO_DEEP,
    category: 'runtime',
    messageTemplate: 'expression nested too deeply (more than {limit} levels)',
  },
];

export const ERROR_REGISTRY: ErrorRegistry = new ErrorRegistryImpl(
  ERROR_DEFINITIONS
);

// ============================================================
// TEMPLATE RENDERING
// ============================================================

/**
 * Render a message template by replacing `{name}` placeholders with values
 * from the context. Missing values render as the empty string; an unclosed
 * brace returns the template unchanged.
 *
 * @example
 * renderMessage('undefined variable: {name}', { name: 'x' })
 * // "undefined variable: x"
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
