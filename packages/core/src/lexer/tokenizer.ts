/**
 * Tokenizer
 * Main tokenization logic
 */

import type { Token } from '../types.js';
import { ErrorState, LOX_ERROR_CODES, TOKEN_TYPES } from '../types.js';
import { ScanError } from './errors.js';
import { isDigit, isWhitespace, isWordChar, makeToken } from './helpers.js';
import { EQUAL_SUFFIX_OPERATORS, SINGLE_CHAR_OPERATORS } from './operators.js';
import { readNumber, readString, readWord, skipLineComment } from './readers.js';
import {
  advance,
  completeCodePoint,
  createLexerState,
  isAtEnd,
  type LexerState,
  match,
  peek,
  recordError,
} from './state.js';

function skipWhitespace(state: LexerState): void {
  while (!isAtEnd(state)) {
    const ch = peek(state);
    if (isWhitespace(ch) || ch === '\n') {
      advance(state);
    } else if (ch === '/' && peek(state, 1) === '/') {
      skipLineComment(state);
    } else {
      return;
    }
  }
}

/**
 * Scan the next token.
 * Returns null when the input at the cursor was malformed; the error is
 * recorded on the state and the cursor has moved past it.
 */
export function nextToken(state: LexerState): Token | null {
  skipWhitespace(state);

  if (isAtEnd(state)) {
    return makeToken(TOKEN_TYPES.EOF, state.line);
  }

  const line = state.line;
  const ch = peek(state);

  if (ch === '"') {
    return readString(state);
  }

  if (isDigit(ch)) {
    return readNumber(state);
  }

  if (isWordChar(ch)) {
    return readWord(state);
  }

  advance(state);

  // ! = > < take a trailing '='
  const compound = EQUAL_SUFFIX_OPERATORS[ch];
  if (compound) {
    const [withEqual, alone] = compound;
    return makeToken(match(state, '=') ? withEqual : alone, line);
  }

  // A lone slash; `//` was consumed as a comment above
  if (ch === '/') {
    return makeToken(TOKEN_TYPES.SLASH, line);
  }

  const singleCharType = SINGLE_CHAR_OPERATORS[ch];
  if (singleCharType) {
    return makeToken(singleCharType, line);
  }

  recordError(
    state,
    new ScanError(LOX_ERROR_CODES.SCAN_UNEXPECTED_CHARACTER, line, {
      char: completeCodePoint(state, ch),
    })
  );
  return null;
}

export interface TokenizeResult {
  /** Tokens scanned, always ending with EOF */
  readonly tokens: Token[];
  readonly errors: ScanError[];
  readonly success: boolean;
}

/**
 * Scan source text, collecting every scan error instead of stopping at the
 * first one.
 */
export function tokenizeWithRecovery(
  source: string,
  startLine = 1
): TokenizeResult {
  const state = createLexerState(source, startLine);
  const tokens: Token[] = [];

  for (;;) {
    const token = nextToken(state);
    if (token === null) continue;
    tokens.push(token);
    if (token.type === TOKEN_TYPES.EOF) break;
  }

  return {
    tokens,
    errors: state.errors,
    success: state.errors.length === 0,
  };
}

/**
 * Scan source text into tokens.
 *
 * @param startLine - Line number of the first line (REPL hosts pass the input line)
 * @throws ErrorState (scan) holding every scan error found
 */
export function tokenize(source: string, startLine = 1): Token[] {
  const { tokens, errors } = tokenizeWithRecovery(source, startLine);
  if (errors.length > 0) {
    throw ErrorState.scan(errors);
  }
  return tokens;
}
