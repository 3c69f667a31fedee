/**
 * Program Execution
 *
 * Public API for executing parsed programs.
 * Provides both full execution and step-by-step execution.
 */

import type { ProgramNode } from '../../types.js';
import { ErrorState, RuntimeError } from '../../types.js';
import { getVariables } from './context.js';
import { executeDeclaration } from './eval/index.js';
import type {
  ExecutionResult,
  ExecutionStepper,
  RuntimeContext,
  StepResult,
} from './types.js';
import type { LoxValue } from './values.js';

/**
 * Execute a parsed program.
 * Declarations run in order; the first runtime error stops the program.
 *
 * @param program The parsed AST (from parse())
 * @param context The runtime context (from createRuntimeContext())
 * @returns The last declaration's value and all variables
 * @throws ErrorState (runtime) holding the error that stopped execution
 */
export function execute(
  program: ProgramNode,
  context: RuntimeContext
): ExecutionResult {
  const stepper = createStepper(program, context);
  while (!stepper.done) {
    stepper.step();
  }
  return stepper.getResult();
}

/**
 * Create a stepper for controlled step-by-step execution.
 * Allows the caller to control the execution loop and inspect state between
 * steps.
 *
 * @param program The parsed AST (from parse())
 * @param context The runtime context (from createRuntimeContext())
 */
export function createStepper(
  program: ProgramNode,
  context: RuntimeContext
): ExecutionStepper {
  const declarations = program.declarations;
  const total = declarations.length;
  let index = 0;
  let lastValue: LoxValue = null;
  let isDone = total === 0;

  return {
    get done() {
      return isDone;
    },
    get index() {
      return index;
    },
    get total() {
      return total;
    },
    get context() {
      return context;
    },

    step(): StepResult {
      const decl = declarations[index];
      if (isDone || !decl) {
        isDone = true;
        return { value: lastValue, done: true, index, total };
      }

      const startTime = Date.now();

      context.observability.onStepStart?.({
        index,
        total,
        declaration: decl,
      });

      let value: LoxValue;
      try {
        value = executeDeclaration(decl, context);
      } catch (error) {
        // A failed declaration ends the program
        isDone = true;

        context.observability.onError?.({
          error: error instanceof Error ? error : new Error(String(error)),
          index,
        });

        if (error instanceof RuntimeError) {
          throw ErrorState.runtime(error);
        }
        throw error;
      }

      lastValue = value;

      context.observability.onStepEnd?.({
        index,
        total,
        value,
        durationMs: Date.now() - startTime,
      });

      index++;
      isDone = index >= total;

      return {
        value,
        done: isDone,
        index: index - 1,
        total,
        defined:
          decl.type === 'VarDecl' ? { name: decl.name.name, value } : undefined,
      };
    },

    getResult(): ExecutionResult {
      return {
        value: lastValue,
        variables: getVariables(context),
      };
    },
  };
}
