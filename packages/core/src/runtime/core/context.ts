/**
 * Runtime Context Factory
 *
 * Creates and configures the runtime context for program execution.
 * Public API for host applications.
 */

import type {
  RuntimeCallbacks,
  RuntimeContext,
  RuntimeOptions,
} from './types.js';
import { formatValue, type LoxValue } from './values.js';

const defaultCallbacks: RuntimeCallbacks = {
  onPrint: (value) => {
    console.log(formatValue(value));
  },
};

/**
 * Create a runtime context for program execution.
 * The context owns the global environment; reuse it to keep bindings
 * across programs (one per REPL line, for instance).
 */
export function createRuntimeContext(
  options: RuntimeOptions = {}
): RuntimeContext {
  const variables = new Map<string, LoxValue>();

  if (options.variables) {
    for (const [name, value] of Object.entries(options.variables)) {
      variables.set(name, value);
    }
  }

  return {
    variables,
    callbacks: { ...defaultCallbacks, ...options.callbacks },
    observability: options.observability ?? {},
  };
}

/**
 * Snapshot the environment as a plain object.
 */
export function getVariables(ctx: RuntimeContext): Record<string, LoxValue> {
  // Own data properties, so names such as __proto__ survive
  return Object.fromEntries(ctx.variables);
}
