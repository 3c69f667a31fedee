/**
 * Error State
 * Carries the diagnostics of exactly one pipeline phase.
 */

import type { LoxError, ParseError, RuntimeError } from './error-classes.js';
import type { ScanError } from './lexer/errors.js';

export type ErrorPhase = 'scan' | 'parse' | 'runtime';

/** Error type accepted by each phase */
export interface PhaseErrors {
  scan: ScanError;
  parse: ParseError;
  runtime: RuntimeError;
}

/**
 * Scan and parse states accumulate every error found in one pass.
 * A runtime state holds the single error that stopped execution and
 * rejects further additions.
 *
 * ErrorState is thrown by `tokenize`, `parse` and `execute` so hosts can
 * catch one type for every phase.
 */
export class ErrorState<P extends ErrorPhase = ErrorPhase> extends Error {
  readonly phase: P;
  private readonly collected: PhaseErrors[P][];

  private constructor(phase: P, errors: readonly PhaseErrors[P][]) {
    super('');
    this.name = 'ErrorState';
    this.phase = phase;
    this.collected = [...errors];
    this.message = this.format();
  }

  static scan(errors: readonly ScanError[] = []): ErrorState<'scan'> {
    return new ErrorState('scan', errors);
  }

  static parse(errors: readonly ParseError[] = []): ErrorState<'parse'> {
    return new ErrorState('parse', errors);
  }

  static runtime(error: RuntimeError): ErrorState<'runtime'> {
    return new ErrorState('runtime', [error]);
  }

  get errors(): readonly LoxError[] {
    return this.collected;
  }

  get isEmpty(): boolean {
    return this.collected.length === 0;
  }

  /**
   * Append a diagnostic.
   * @throws TypeError on a runtime state, which holds exactly one error
   */
  add(error: PhaseErrors[P]): void {
    if (this.phase === 'runtime') {
      throw new TypeError('A runtime error state holds a single error');
    }
    this.collected.push(error);
    this.message = this.format();
  }

  /** One `[line]: message` line per error, in the order they were produced */
  format(): string {
    return this.collected.map((error) => error.format()).join('\n');
  }
}

/** Type guard for any ErrorState */
export function isErrorState(value: unknown): value is ErrorState {
  return value instanceof ErrorState;
}
