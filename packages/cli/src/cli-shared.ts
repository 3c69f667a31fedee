/**
 * CLI Shared Utilities
 * Common formatting functions for CLI tools
 */

import {
  formatValue,
  isErrorState,
  LoxError,
  VERSION,
} from '@treelox/core';
import type { LoxValue } from '@treelox/core';

/** Process exit codes */
export const EXIT_CODES = {
  SUCCESS: 0,
  /** Usage, configuration, or file errors */
  FAILURE: 1,
  /** Scan, parse, or runtime errors in the program */
  DATA_ERROR: 65,
} as const;

/**
 * Convert a value to the text a print statement writes
 */
export function formatOutput(value: LoxValue): string {
  return formatValue(value);
}

/**
 * Format error for stderr output.
 * Program diagnostics render as one `[line]: message` line per error.
 */
export function formatError(err: unknown): string {
  if (isErrorState(err) || err instanceof LoxError) {
    return err.format();
  }

  // Handle file not found errors (ENOENT)
  if (
    err instanceof Error &&
    'code' in err &&
    err.code === 'ENOENT' &&
    'path' in err
  ) {
    return `File not found: ${String(err.path)}`;
  }

  if (err instanceof Error) {
    return err.message;
  }
  return String(err);
}

/**
 * Determine the exit code for an error that ended a run
 *
 * @returns 65 for program diagnostics, 1 for everything else
 */
export function determineExitCode(err: unknown): number {
  if (isErrorState(err) || err instanceof LoxError) {
    return EXIT_CODES.DATA_ERROR;
  }
  return EXIT_CODES.FAILURE;
}

/**
 * Detect help or version flags in CLI argument array.
 * Checks for --help, -h, --version, -v in any position.
 *
 * @param argv - Command-line arguments (process.argv.slice(2))
 * @returns Object with mode if flag found, null otherwise
 */
export function detectHelpVersionFlag(
  argv: readonly string[]
): { mode: 'help' | 'version' } | null {
  // Help takes precedence over version
  if (argv.includes('--help') || argv.includes('-h')) {
    return { mode: 'help' };
  }
  if (argv.includes('--version') || argv.includes('-v')) {
    return { mode: 'version' };
  }
  return null;
}

export { VERSION };
