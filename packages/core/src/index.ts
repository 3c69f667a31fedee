/**
 * treelox Core
 * Exports scanner, parser, runtime, and AST types
 */

export {
  ScanError,
  tokenize,
  tokenizeWithRecovery,
  type TokenizeResult,
} from './lexer/index.js';
export {
  parse,
  parseSource,
  parseWithRecovery,
  type ParseResult,
} from './parser/index.js';
export {
  createRuntimeContext,
  createStepper,
  type DefineEvent,
  type ErrorEvent,
  evaluateExpression,
  execute,
  type ExecutionResult,
  type ExecutionStepper,
  formatNumber,
  formatValue,
  getVariables,
  inferType,
  type LoxValue,
  type ObservabilityCallbacks,
  type RuntimeCallbacks,
  type RuntimeContext,
  type RuntimeOptions,
  type StepEndEvent,
  type StepResult,
  type StepStartEvent,
  toFloat32,
  valuesEqual,
} from './runtime/index.js';

// ============================================================
// AST TRAVERSAL
// ============================================================
export { type NodeVisitor, visitNode } from './ast-visitor.js';

// ============================================================
// VERSION
// ============================================================
export const VERSION = '0.1.0';

export * from './types.js';
