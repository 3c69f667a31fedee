/**
 * Token Readers
 * Functions to read specific token types from source.
 * Readers record malformed input on the state and return null.
 */

import type { NumberToken, Token } from '../types.js';
import { KEYWORDS, LOX_ERROR_CODES, TOKEN_TYPES } from '../types.js';
import { ScanError } from './errors.js';
import { isDigit, isWordChar, makeTextToken, makeToken } from './helpers.js';
import { advance, isAtEnd, type LexerState, peek, recordError } from './state.js';

/** Valid numerals: digits with at most one decimal point */
const NUMBER_PATTERN = /^\d+(\.\d*)?$/;

/**
 * Read a string literal. The opening quote is the current character.
 * Newlines are kept in the value; the token carries the opening line.
 */
export function readString(state: LexerState): Token | null {
  const line = state.line;
  advance(state); // consume opening "

  let value = '';
  while (!isAtEnd(state) && peek(state) !== '"') {
    value += advance(state);
  }

  if (isAtEnd(state)) {
    recordError(
      state,
      new ScanError(LOX_ERROR_CODES.SCAN_UNTERMINATED_STRING, line)
    );
    return null;
  }

  advance(state); // consume closing "
  return makeTextToken(TOKEN_TYPES.STRING, value, line);
}

/**
 * Read a number literal: a digit followed greedily by digits and dots.
 * The value is rounded to 32-bit float precision.
 */
export function readNumber(state: LexerState): NumberToken | null {
  const line = state.line;
  let lexeme = '';

  while (isDigit(peek(state)) || peek(state) === '.') {
    lexeme += advance(state);
  }

  if (!NUMBER_PATTERN.test(lexeme)) {
    recordError(
      state,
      new ScanError(LOX_ERROR_CODES.SCAN_INVALID_NUMBER, line, { lexeme })
    );
    return null;
  }

  return {
    type: TOKEN_TYPES.NUMBER,
    value: Math.fround(parseFloat(lexeme)),
    line,
  };
}

/** Read an identifier or keyword */
export function readWord(state: LexerState): Token {
  const line = state.line;
  let word = '';

  while (isWordChar(peek(state))) {
    word += advance(state);
  }

  const keyword = Object.hasOwn(KEYWORDS, word) ? KEYWORDS[word] : undefined;
  if (keyword !== undefined) {
    return makeToken(keyword, line);
  }
  return makeTextToken(TOKEN_TYPES.IDENTIFIER, word, line);
}

/** Discard a `//` comment up to (not including) the newline */
export function skipLineComment(state: LexerState): void {
  while (!isAtEnd(state) && peek(state) !== '\n') {
    advance(state);
  }
}
