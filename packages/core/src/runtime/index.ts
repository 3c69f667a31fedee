/**
 * treelox Runtime
 *
 * Public API for executing programs.
 *
 * Module Structure:
 * - core/: Execution engine
 *   - types.ts: Public types (RuntimeContext, RuntimeOptions, etc.)
 *   - values.ts: LoxValue and value utilities
 *   - context.ts: Runtime context factory
 *   - execute.ts: Program execution (execute, createStepper)
 *   - eval/: Mixin-composed evaluator (internal)
 */

// ============================================================
// PUBLIC TYPES
// ============================================================

export type {
  DefineEvent,
  ErrorEvent,
  ExecutionResult,
  ExecutionStepper,
  ObservabilityCallbacks,
  RuntimeCallbacks,
  RuntimeContext,
  RuntimeOptions,
  StepEndEvent,
  StepResult,
  StepStartEvent,
} from './core/types.js';

// ============================================================
// VALUES
// ============================================================

export {
  formatNumber,
  formatValue,
  inferType,
  type LoxValue,
  toFloat32,
  valuesEqual,
} from './core/values.js';

// ============================================================
// CONTEXT AND EXECUTION
// ============================================================

export { createRuntimeContext, getVariables } from './core/context.js';
export { createStepper, execute } from './core/execute.js';
export { evaluateExpression } from './core/eval/index.js';
