/**
 * Lexer State
 * Tracks position in source text during tokenization
 */

import type { ScanError } from './errors.js';

export interface LexerState {
  readonly source: string;
  pos: number;
  line: number;
  /** Errors recorded so far; scanning continues past each one */
  readonly errors: ScanError[];
}

export function createLexerState(source: string, startLine = 1): LexerState {
  return {
    source,
    pos: 0,
    line: startLine,
    errors: [],
  };
}

export function peek(state: LexerState, offset = 0): string {
  return state.source[state.pos + offset] ?? '';
}

export function advance(state: LexerState): string {
  const ch = state.source[state.pos] ?? '';
  state.pos++;
  if (ch === '\n') {
    state.line++;
  }
  return ch;
}

/**
 * Finish reading a character whose first UTF-16 unit was just consumed,
 * taking the low half of a surrogate pair as well.
 */
export function completeCodePoint(state: LexerState, first: string): string {
  const codePoint = state.source.codePointAt(state.pos - 1);
  if (codePoint === undefined || codePoint <= 0xffff) return first;
  state.pos++;
  return String.fromCodePoint(codePoint);
}

/** Consume the next character only if it equals `expected` */
export function match(state: LexerState, expected: string): boolean {
  if (isAtEnd(state) || peek(state) !== expected) return false;
  advance(state);
  return true;
}

export function isAtEnd(state: LexerState): boolean {
  return state.pos >= state.source.length;
}

export function recordError(state: LexerState, error: ScanError): void {
  state.errors.push(error);
}
