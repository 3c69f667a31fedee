#!/usr/bin/env -S node --import tsx
/**
 * CLI Execution Entry Point
 *
 * Implements main(), parseArgs(), and runFile() for the treelox binary.
 * With a file argument the file is run; without one an interactive
 * session starts.
 */

import * as fs from 'node:fs/promises';
import { type CliConfig, loadConfig } from './cli-config.js';
import { startRepl } from './cli-repl.js';
import { createCliContext, runSource } from './cli-run.js';
import {
  determineExitCode,
  detectHelpVersionFlag,
  EXIT_CODES,
  formatError,
  VERSION,
} from './cli-shared.js';

/**
 * Parsed command-line arguments
 */
export type ParsedArgs =
  | {
      mode: 'run';
      /** Program file; undefined starts the interactive session */
      file: string | undefined;
      /** True when --debug-ast was given */
      debugAst: boolean;
      configPath: string | undefined;
    }
  | { mode: 'help' | 'version' };

const HELP_TEXT = `Usage:
  treelox [options] [file]   Run a program file, or start a session without one

Options:
  --debug-ast           Print each declaration's tree before executing it
  --config <path>       Read options from a YAML file (default: ./.treelox.yaml)
  -h, --help            Show this help message
  -v, --version         Show version information

Exit codes:
  0   success
  1   usage, configuration or file error
  65  scan, parse or runtime error in the program

Examples:
  treelox program.lox
  treelox --debug-ast program.lox
  treelox --config session.yaml`;

/**
 * Parse command-line arguments into structured command
 *
 * @param argv - Raw command-line arguments (typically process.argv.slice(2))
 * @returns Parsed command object
 * @throws Error on an unknown option, a missing option value, or a second
 * positional argument
 */
export function parseArgs(argv: readonly string[]): ParsedArgs {
  // Check for --help or --version flags in any position
  const helpOrVersion = detectHelpVersionFlag(argv);
  if (helpOrVersion) {
    return helpOrVersion;
  }

  let file: string | undefined;
  let debugAst = false;
  let configPath: string | undefined;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === undefined) continue;

    if (arg === '--debug-ast') {
      debugAst = true;
      continue;
    }

    if (arg === '--config') {
      const value = argv[i + 1];
      if (value === undefined || value.startsWith('-')) {
        throw new Error('Missing path after --config');
      }
      configPath = value;
      i++;
      continue;
    }

    if (arg.startsWith('-')) {
      throw new Error(`Unknown option: ${arg}`);
    }

    if (file !== undefined) {
      throw new Error(`Unexpected argument: ${arg}`);
    }
    file = arg;
  }

  return { mode: 'run', file, debugAst, configPath };
}

/**
 * Run a program file in a fresh context
 *
 * @throws Error (ENOENT) if the file does not exist
 * @throws ErrorState if the program fails to scan, parse or run
 */
export async function runFile(file: string, config: CliConfig): Promise<void> {
  const source = await fs.readFile(file, 'utf-8');
  runSource(source, createCliContext(), {
    debugAst: config.debugAst,
    startLine: 1,
  });
}

/**
 * Entry point for the treelox binary
 *
 * Parses command-line arguments, runs the file or the session, and handles
 * errors. Writes program output to stdout and diagnostics to stderr.
 */
export async function main(
  argv: readonly string[] = process.argv.slice(2)
): Promise<void> {
  try {
    const parsed = parseArgs(argv);

    switch (parsed.mode) {
      case 'help':
        console.log(HELP_TEXT);
        return;

      case 'version':
        console.log(VERSION);
        return;

      case 'run': {
        const fileConfig = loadConfig(process.cwd(), parsed.configPath);
        // Flags override the file
        const config: CliConfig = {
          ...fileConfig,
          debugAst: parsed.debugAst || fileConfig.debugAst,
        };

        if (parsed.file === undefined) {
          await startRepl(createCliContext(), config);
        } else {
          await runFile(parsed.file, config);
        }
        process.exitCode = EXIT_CODES.SUCCESS;
        return;
      }
    }
  } catch (err) {
    console.error(formatError(err));
    process.exitCode = determineExitCode(err);
  }
}

// Only run main if not in test environment
const shouldRunMain =
  process.env['NODE_ENV'] !== 'test' &&
  !process.env['VITEST'] &&
  !process.env['VITEST_WORKER_ID'];

if (shouldRunMain) {
  main().catch((err: unknown) => {
    console.error(formatError(err));
    process.exit(EXIT_CODES.FAILURE);
  });
}
