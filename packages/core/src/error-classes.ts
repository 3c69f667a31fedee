/**
 * treelox Error Classes and Factory
 * Structured error types with registry-based error codes
 */

import {
  ERROR_REGISTRY,
  renderMessage,
  type ErrorCategory,
} from './error-registry.js';

// ============================================================
// ERROR DATA
// ============================================================

/** Structured error data for host applications */
export interface LoxErrorData {
  readonly errorId: string;
  readonly message: string;
  readonly line: number;
  readonly context?: Record<string, unknown> | undefined;
}

// ============================================================
// MESSAGE RESOLUTION
// ============================================================

/**
 * Look up an error definition and render its message template.
 *
 * @throws TypeError if the ID is unknown or belongs to another category
 */
export function renderErrorMessage(
  errorId: string,
  category: ErrorCategory,
  context: Record<string, unknown>
): string {
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    throw new TypeError(`Unknown error ID: ${errorId}`);
  }
  if (definition.category !== category) {
    throw new TypeError(`Expected ${category} error ID, got: ${errorId}`);
  }
  return renderMessage(definition.messageTemplate, context);
}

// ============================================================
// BASE ERROR CLASS
// ============================================================

/**
 * Base error class for all treelox diagnostics.
 * Provides structured data for host applications to format as needed.
 */
export class LoxError extends Error {
  readonly errorId: string;
  readonly line: number;
  readonly context?: Record<string, unknown> | undefined;

  constructor(data: LoxErrorData) {
    if (!ERROR_REGISTRY.has(data.errorId)) {
      throw new TypeError(`Unknown error ID: ${data.errorId}`);
    }

    super(data.message);
    this.name = 'LoxError';
    this.errorId = data.errorId;
    this.line = data.line;
    this.context = data.context;
  }

  /** Get structured error data for custom formatting */
  toData(): LoxErrorData {
    return {
      errorId: this.errorId,
      message: this.message,
      line: this.line,
      context: this.context,
    };
  }

  /** Format as `[line]: message` (can be overridden by host) */
  format(formatter?: (data: LoxErrorData) => string): string {
    if (formatter) return formatter(this.toData());
    return `[${this.line}]: ${this.message}`;
  }
}

// ============================================================
// SPECIALIZED ERROR CLASSES
// ============================================================

/** Parse-time errors */
export class ParseError extends LoxError {
  constructor(
    errorId: string,
    line: number,
    context: Record<string, unknown> = {}
  ) {
    super({
      errorId,
      message: renderErrorMessage(errorId, 'parse', context),
      line,
      context,
    });
    this.name = 'ParseError';
  }
}

/** Runtime execution errors */
export class RuntimeError extends LoxError {
  constructor(
    errorId: string,
    line: number,
    context: Record<string, unknown> = {}
  ) {
    super({
      errorId,
      message: renderErrorMessage(errorId, 'runtime', context),
      line,
      context,
    });
    this.name = 'RuntimeError';
  }

  /** Create from an AST node */
  static fromNode(
    errorId: string,
    node: { readonly line: number },
    context?: Record<string, unknown>
  ): RuntimeError {
    return new RuntimeError(errorId, node.line, context);
  }
}
