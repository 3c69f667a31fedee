/**
 * Program Runner
 * Scans, parses and executes source text against a runtime context.
 */

import {
  createRuntimeContext,
  createStepper,
  parse,
  tokenize,
  type RuntimeContext,
} from '@treelox/core';
import { formatDeclaration } from './cli-ast-printer.js';
import { formatOutput } from './cli-shared.js';

export interface RunOptions {
  /** Print each declaration's tree before executing it */
  readonly debugAst: boolean;
  /** Line number of the first source line */
  readonly startLine: number;
}

/**
 * Create the context a CLI session runs in: print statements write to
 * stdout.
 */
export function createCliContext(): RuntimeContext {
  return createRuntimeContext({
    callbacks: {
      onPrint: (value) => console.log(formatOutput(value)),
    },
  });
}

/**
 * Run source text to completion.
 *
 * @throws ErrorState from whichever phase failed; nothing runs unless the
 * whole source scans and parses
 */
export function runSource(
  source: string,
  ctx: RuntimeContext,
  options: RunOptions
): void {
  const program = parse(tokenize(source, options.startLine));
  const stepper = createStepper(program, ctx);

  while (!stepper.done) {
    const decl = program.declarations[stepper.index];
    if (options.debugAst && decl) {
      for (const line of formatDeclaration(decl)) {
        console.log(line);
      }
    }
    stepper.step();
  }
}
