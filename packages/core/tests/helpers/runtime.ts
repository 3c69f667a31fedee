/**
 * Test utilities for runtime tests
 */

import {
  createRuntimeContext,
  createStepper,
  type DefineEvent,
  type ErrorEvent,
  execute,
  type ExecutionResult,
  type LoxValue,
  type ObservabilityCallbacks,
  parseSource,
  type RuntimeContext,
  type RuntimeOptions,
  type StepEndEvent,
  type StepResult,
  type StepStartEvent,
} from '../../src/index.js';

/** Shared setup for all execution modes; prints go to the returned list */
function setup(source: string, options: RuntimeOptions = {}) {
  const printed: LoxValue[] = [];
  const ctx = createRuntimeContext({
    ...options,
    callbacks: { onPrint: (value) => printed.push(value), ...options.callbacks },
  });
  return { ast: parseSource(source), ctx, printed };
}

/** Execute a program and return the last declaration's value */
export function run(source: string, options: RuntimeOptions = {}): LoxValue {
  const { ast, ctx } = setup(source, options);
  return execute(ast, ctx).value;
}

/** Execute and return full result with variables */
export function runFull(
  source: string,
  options: RuntimeOptions = {}
): ExecutionResult {
  const { ast, ctx } = setup(source, options);
  return execute(ast, ctx);
}

/** Execute and return every printed value */
export function runPrinted(
  source: string,
  options: RuntimeOptions = {}
): LoxValue[] {
  const { ast, ctx, printed } = setup(source, options);
  execute(ast, ctx);
  return printed;
}

/**
 * Execute, catching the error that stops the program.
 * Returns whatever was printed before it.
 */
export function runUntilError(
  source: string,
  options: RuntimeOptions = {}
): { printed: LoxValue[]; error: unknown; ctx: RuntimeContext } {
  const { ast, ctx, printed } = setup(source, options);
  try {
    execute(ast, ctx);
  } catch (error) {
    return { printed, error, ctx };
  }
  throw new Error(`Expected a runtime error from: ${source}`);
}

/** Execute using stepper and return all step results */
export function runStepped(
  source: string,
  options: RuntimeOptions = {}
): StepResult[] {
  const { ast, ctx } = setup(source, options);
  const stepper = createStepper(ast, ctx);
  const results: StepResult[] = [];

  while (!stepper.done) {
    results.push(stepper.step());
  }

  return results;
}

/** Event collector for observability testing */
export interface CollectedEvents {
  stepStart: StepStartEvent[];
  stepEnd: StepEndEvent[];
  define: DefineEvent[];
  error: ErrorEvent[];
}

/** Create an event collector for observability callbacks */
export function createEventCollector(): {
  events: CollectedEvents;
  callbacks: ObservabilityCallbacks;
} {
  const events: CollectedEvents = {
    stepStart: [],
    stepEnd: [],
    define: [],
    error: [],
  };

  const callbacks: ObservabilityCallbacks = {
    onStepStart: (e) => events.stepStart.push(e),
    onStepEnd: (e) => events.stepEnd.push(e),
    onDefine: (e) => events.define.push(e),
    onError: (e) => events.error.push(e),
  };

  return { events, callbacks };
}
