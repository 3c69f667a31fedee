/**
 * CLI Shared Utilities Tests
 * Tests for formatError, formatOutput, and determineExitCode functions
 */

import { describe, expect, it } from 'vitest';
import { ErrorState, parseSource, RuntimeError } from '@treelox/core';
import {
  determineExitCode,
  detectHelpVersionFlag,
  EXIT_CODES,
  formatError,
  formatOutput,
} from '../src/cli-shared.js';

function parseFailure(source: string): unknown {
  try {
    parseSource(source);
  } catch (err) {
    return err;
  }
  throw new Error('expected a parse failure');
}

describe('cli-shared', () => {
  describe('formatError', () => {
    it('renders every diagnostic of a failed phase', () => {
      const err = parseFailure('var = 1;\nprint 2');
      expect(formatError(err)).toBe(
        "[1]: expected variable name, found '='\n" +
          "[2]: expected ';' after value, found end of input"
      );
    });

    it('renders a single runtime error', () => {
      const err = new RuntimeError('LOX-R001', 7, { name: 'q' });
      expect(formatError(err)).toBe('[7]: undefined variable: q');
    });

    it('reports a missing file by path', () => {
      const err = Object.assign(new Error('ENOENT: no such file'), {
        code: 'ENOENT',
        path: 'missing.lox',
      });
      expect(formatError(err)).toBe('File not found: missing.lox');
    });

    it('uses the message of other errors', () => {
      expect(formatError(new Error('Unknown option: --fast'))).toBe(
        'Unknown option: --fast'
      );
    });

    it('stringifies non-errors', () => {
      expect(formatError('plain text')).toBe('plain text');
    });
  });

  describe('formatOutput', () => {
    it('formats values the way print writes them', () => {
      expect(formatOutput(null)).toBe('nil');
      expect(formatOutput(Math.fround(2.5))).toBe('2.5');
      expect(formatOutput('text')).toBe('text');
      expect(formatOutput(false)).toBe('false');
    });
  });

  describe('determineExitCode', () => {
    it('returns 65 for program diagnostics', () => {
      expect(determineExitCode(parseFailure('('))).toBe(EXIT_CODES.DATA_ERROR);
      expect(
        determineExitCode(
          ErrorState.runtime(new RuntimeError('LOX-R002', 1))
        )
      ).toBe(65);
    });

    it('returns 1 for everything else', () => {
      expect(determineExitCode(new Error('boom'))).toBe(EXIT_CODES.FAILURE);
    });
  });

  describe('detectHelpVersionFlag', () => {
    it('finds flags in any position', () => {
      expect(detectHelpVersionFlag(['a.lox', '-h'])).toEqual({ mode: 'help' });
      expect(detectHelpVersionFlag(['--version'])).toEqual({ mode: 'version' });
    });

    it('prefers help over version', () => {
      expect(detectHelpVersionFlag(['-v', '--help'])).toEqual({ mode: 'help' });
    });

    it('returns null without a flag', () => {
      expect(detectHelpVersionFlag(['a.lox'])).toBeNull();
    });
  });
});
