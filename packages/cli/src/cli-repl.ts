/**
 * Interactive Session
 * Line-at-a-time evaluation sharing one environment.
 */

import * as readline from 'node:readline';
import type { RuntimeContext } from '@treelox/core';
import type { CliConfig } from './cli-config.js';
import { runSource } from './cli-run.js';
import { formatError } from './cli-shared.js';

/**
 * Turn a raw input line into a program.
 * Blank lines yield null; a statement terminator is appended when missing
 * so bare expressions can be typed.
 *
 * @example
 * prepareReplLine('  1 + 2 ') // "1 + 2;"
 * prepareReplLine('print 1;') // "print 1;"
 */
export function prepareReplLine(line: string): string | null {
  const trimmed = line.trim();
  if (trimmed === '') return null;
  return trimmed.endsWith(';') ? trimmed : `${trimmed};`;
}

/**
 * Evaluate one input line. Errors are written to stderr and do not end the
 * session; bindings made before the error are kept.
 *
 * @param lineNumber - 1-based input line number, used as the starting line
 * @returns false if the line produced an error
 */
export function evaluateReplLine(
  line: string,
  lineNumber: number,
  ctx: RuntimeContext,
  config: CliConfig
): boolean {
  const source = prepareReplLine(line);
  if (source === null) return true;

  try {
    runSource(source, ctx, { debugAst: config.debugAst, startLine: lineNumber });
    return true;
  } catch (err) {
    console.error(formatError(err));
    return false;
  }
}

/**
 * Run the interactive session until input ends.
 */
export function startRepl(
  ctx: RuntimeContext,
  config: CliConfig,
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout
): Promise<void> {
  const rl = readline.createInterface({
    input,
    output,
    prompt: config.prompt,
  });

  let lineNumber = 0;

  rl.on('line', (line) => {
    lineNumber++;
    evaluateReplLine(line, lineNumber, ctx, config);
    rl.prompt();
  });

  return new Promise((resolve) => {
    rl.on('close', () => {
      // Avoid leaving the prompt printed without a newline
      output.write('\n');
      resolve();
    });
    rl.prompt();
  });
}
