/**
 * Runtime Types
 *
 * Public types for runtime configuration and execution results.
 * These types are the primary interface for host applications.
 */

import type { DeclarationNode } from '../../types.js';
import type { LoxValue } from './values.js';

/** I/O callbacks for runtime operations */
export interface RuntimeCallbacks {
  /** Called when a print statement runs */
  onPrint: (value: LoxValue) => void;
}

/** Observability callbacks for monitoring execution */
export interface ObservabilityCallbacks {
  /** Called before each declaration executes */
  onStepStart?: (event: StepStartEvent) => void;
  /** Called after each declaration executes */
  onStepEnd?: (event: StepEndEvent) => void;
  /** Called when a variable is bound */
  onDefine?: (event: DefineEvent) => void;
  /** Called when an error occurs */
  onError?: (event: ErrorEvent) => void;
}

/** Event emitted before a declaration executes */
export interface StepStartEvent {
  /** Declaration index (0-based) */
  index: number;
  /** Total declarations */
  total: number;
  /** Declaration about to run */
  declaration: DeclarationNode;
}

/** Event emitted after a declaration executes */
export interface StepEndEvent {
  /** Declaration index (0-based) */
  index: number;
  /** Total declarations */
  total: number;
  /** Value produced by the declaration */
  value: LoxValue;
  /** Execution time in milliseconds */
  durationMs: number;
}

/** Event emitted when a variable is bound */
export interface DefineEvent {
  name: string;
  value: LoxValue;
}

/** Event emitted on error */
export interface ErrorEvent {
  /** The error that occurred */
  error: Error;
  /** Declaration index where the error occurred (if available) */
  index?: number;
}

/** Runtime context with the global environment and callbacks */
export interface RuntimeContext {
  /** Global environment; the only scope */
  readonly variables: Map<string, LoxValue>;
  /** I/O callbacks */
  readonly callbacks: RuntimeCallbacks;
  /** Observability callbacks */
  readonly observability: ObservabilityCallbacks;
}

/** Options for creating a runtime context */
export interface RuntimeOptions {
  /** Initial variables */
  variables?: Record<string, LoxValue>;
  /** I/O callbacks */
  callbacks?: Partial<RuntimeCallbacks>;
  /** Observability callbacks for monitoring execution */
  observability?: ObservabilityCallbacks;
}

/** Result of program execution */
export interface ExecutionResult {
  /** Value produced by the last declaration (nil for an empty program) */
  value: LoxValue;
  /** Every variable in the environment after execution */
  variables: Record<string, LoxValue>;
}

/** Result of a single step execution */
export interface StepResult {
  /** Value produced by this step */
  value: LoxValue;
  /** Whether execution is complete (no more declarations) */
  done: boolean;
  /** Index of the declaration this step ran (0-based) */
  index: number;
  /** Total number of declarations */
  total: number;
  /** Variable bound by this step (if any) */
  defined?: { name: string; value: LoxValue } | undefined;
}

/** Stepper for controlled step-by-step execution */
export interface ExecutionStepper {
  /** Whether execution is complete */
  readonly done: boolean;
  /** Index of the next declaration (0-based) */
  readonly index: number;
  /** Total number of declarations */
  readonly total: number;
  /** The runtime context (for inspecting variables) */
  readonly context: RuntimeContext;
  /**
   * Execute the next declaration.
   * @throws ErrorState (runtime) if the declaration fails; the stepper is
   * then done
   */
  step(): StepResult;
  /** Get final result */
  getResult(): ExecutionResult;
}
