/**
 * Operator Lookup Tables
 */

import type { SimpleTokenType } from '../types.js';
import { TOKEN_TYPES } from '../types.js';

/** Characters that always form a token on their own */
export const SINGLE_CHAR_OPERATORS: Readonly<Record<string, SimpleTokenType>> =
  {
    '(': TOKEN_TYPES.LPAREN,
    ')': TOKEN_TYPES.RPAREN,
    '{': TOKEN_TYPES.LBRACE,
    '}': TOKEN_TYPES.RBRACE,
    ',': TOKEN_TYPES.COMMA,
    '.': TOKEN_TYPES.DOT,
    '-': TOKEN_TYPES.MINUS,
    '+': TOKEN_TYPES.PLUS,
    ';': TOKEN_TYPES.SEMICOLON,
    '*': TOKEN_TYPES.STAR,
  };

/**
 * Operators that become a two-character token when followed by `=`.
 * Each entry is [with '=', alone].
 */
export const EQUAL_SUFFIX_OPERATORS: Readonly<
  Record<string, readonly [SimpleTokenType, SimpleTokenType]>
> = {
  '!': [TOKEN_TYPES.BANG_EQUAL, TOKEN_TYPES.BANG],
  '=': [TOKEN_TYPES.EQUAL_EQUAL, TOKEN_TYPES.EQUAL],
  '>': [TOKEN_TYPES.GREATER_EQUAL, TOKEN_TYPES.GREATER],
  '<': [TOKEN_TYPES.LESS_EQUAL, TOKEN_TYPES.LESS],
};
