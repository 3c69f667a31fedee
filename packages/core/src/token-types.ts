// ============================================================
// TOKEN TYPES
// ============================================================

export const TOKEN_TYPES = {
  // Single-character punctuation
  LPAREN: 'LPAREN', // (
  RPAREN: 'RPAREN', // )
  LBRACE: 'LBRACE', // {
  RBRACE: 'RBRACE', // }
  COMMA: 'COMMA', // ,
  DOT: 'DOT', // .
  MINUS: 'MINUS', // -
  PLUS: 'PLUS', // +
  SEMICOLON: 'SEMICOLON', // ;
  SLASH: 'SLASH', // /
  STAR: 'STAR', // *

  // One or two character operators
  BANG: 'BANG', // !
  BANG_EQUAL: 'BANG_EQUAL', // !=
  EQUAL: 'EQUAL', // =
  EQUAL_EQUAL: 'EQUAL_EQUAL', // ==
  GREATER: 'GREATER', // >
  GREATER_EQUAL: 'GREATER_EQUAL', // >=
  LESS: 'LESS', // <
  LESS_EQUAL: 'LESS_EQUAL', // <=

  // Literals
  IDENTIFIER: 'IDENTIFIER',
  STRING: 'STRING',
  NUMBER: 'NUMBER',

  // Keywords
  AND: 'AND',
  CLASS: 'CLASS',
  ELSE: 'ELSE',
  FALSE: 'FALSE',
  FUN: 'FUN',
  FOR: 'FOR',
  IF: 'IF',
  NIL: 'NIL',
  OR: 'OR',
  PRINT: 'PRINT',
  RETURN: 'RETURN',
  SUPER: 'SUPER',
  THIS: 'THIS',
  TRUE: 'TRUE',
  VAR: 'VAR',
  WHILE: 'WHILE',

  // Special
  EOF: 'EOF',
} as const;

export type TokenType = (typeof TOKEN_TYPES)[keyof typeof TOKEN_TYPES];

/** Token types whose token carries a text payload */
export type TextTokenType =
  | typeof TOKEN_TYPES.IDENTIFIER
  | typeof TOKEN_TYPES.STRING;

/** Token types that carry no payload */
export type SimpleTokenType = Exclude<
  TokenType,
  TextTokenType | typeof TOKEN_TYPES.NUMBER
>;

export interface NumberToken {
  readonly type: typeof TOKEN_TYPES.NUMBER;
  /** Value rounded to 32-bit float precision */
  readonly value: number;
  readonly line: number;
}

export interface TextToken {
  readonly type: TextTokenType;
  readonly value: string;
  readonly line: number;
}

export interface SimpleToken {
  readonly type: SimpleTokenType;
  readonly line: number;
}

export type Token = NumberToken | TextToken | SimpleToken;

// ============================================================
// KEYWORDS
// ============================================================

export const KEYWORDS: Readonly<Record<string, SimpleTokenType>> = {
  and: TOKEN_TYPES.AND,
  class: TOKEN_TYPES.CLASS,
  else: TOKEN_TYPES.ELSE,
  false: TOKEN_TYPES.FALSE,
  fun: TOKEN_TYPES.FUN,
  for: TOKEN_TYPES.FOR,
  if: TOKEN_TYPES.IF,
  nil: TOKEN_TYPES.NIL,
  or: TOKEN_TYPES.OR,
  print: TOKEN_TYPES.PRINT,
  return: TOKEN_TYPES.RETURN,
  super: TOKEN_TYPES.SUPER,
  this: TOKEN_TYPES.THIS,
  true: TOKEN_TYPES.TRUE,
  var: TOKEN_TYPES.VAR,
  while: TOKEN_TYPES.WHILE,
};

// ============================================================
// DISPLAY
// ============================================================

const PUNCTUATION_TEXT: Partial<Record<TokenType, string>> = {
  LPAREN: '(',
  RPAREN: ')',
  LBRACE: '{',
  RBRACE: '}',
  COMMA: ',',
  DOT: '.',
  MINUS: '-',
  PLUS: '+',
  SEMICOLON: ';',
  SLASH: '/',
  STAR: '*',
  BANG: '!',
  BANG_EQUAL: '!=',
  EQUAL: '=',
  EQUAL_EQUAL: '==',
  GREATER: '>',
  GREATER_EQUAL: '>=',
  LESS: '<',
  LESS_EQUAL: '<=',
};

/**
 * Human-readable form of a token for diagnostics.
 *
 * @example
 * describeToken({ type: 'IDENTIFIER', value: 'x', line: 1 }) // "identifier 'x'"
 * describeToken({ type: 'SEMICOLON', line: 1 }) // "';'"
 */
export function describeToken(token: Token): string {
  switch (token.type) {
    case TOKEN_TYPES.NUMBER:
      return `number ${token.value}`;
    case TOKEN_TYPES.STRING:
      return `string "${token.value}"`;
    case TOKEN_TYPES.IDENTIFIER:
      return `identifier '${token.value}'`;
    case TOKEN_TYPES.EOF:
      return 'end of input';
  }

  const text = PUNCTUATION_TEXT[token.type];
  if (text !== undefined) return `'${text}'`;

  // Keywords display as their source word
  return `keyword '${token.type.toLowerCase()}'`;
}
