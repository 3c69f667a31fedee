/**
 * Lexer Helper Functions
 * Character classification and token construction
 */

import type {
  SimpleToken,
  SimpleTokenType,
  TextToken,
  TextTokenType,
} from '../types.js';

export function isDigit(ch: string): boolean {
  return ch >= '0' && ch <= '9';
}

function isLetter(ch: string): boolean {
  return (ch >= 'a' && ch <= 'z') || (ch >= 'A' && ch <= 'Z');
}

/** Words are letters and underscores only; a digit ends the word */
export function isWordChar(ch: string): boolean {
  return isLetter(ch) || ch === '_';
}

export function isWhitespace(ch: string): boolean {
  return ch === ' ' || ch === '\t' || ch === '\r';
}

export function makeToken(type: SimpleTokenType, line: number): SimpleToken {
  return { type, line };
}

export function makeTextToken(
  type: TextTokenType,
  value: string,
  line: number
): TextToken {
  return { type, value, line };
}
