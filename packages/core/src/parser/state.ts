/**
 * Parser State
 * Core state management and token navigation utilities
 */

import type { ExpressionNode, Token, TokenType } from '../types.js';
import {
  describeToken,
  LOX_ERROR_CODES,
  MAX_EXPRESSION_DEPTH,
  ParseError,
  TOKEN_TYPES,
} from '../types.js';

// ============================================================
// PARSER STATE
// ============================================================

export interface ParserState {
  readonly tokens: readonly Token[];
  /** Index of the current token; only ever moves forward */
  pos: number;
  /** Errors collected by declaration-level recovery */
  readonly errors: ParseError[];
  /** Unary operators and groups currently being parsed */
  nesting: number;
  /** Height of each operator node built so far; leaves are 1 */
  readonly heights: WeakMap<ExpressionNode, number>;
}

export function createParserState(tokens: readonly Token[]): ParserState {
  return {
    tokens,
    pos: 0,
    errors: [],
    nesting: 0,
    heights: new WeakMap(),
  };
}

// ============================================================
// TOKEN NAVIGATION
// ============================================================

/**
 * Current token. Past the end this is the final token; a token list
 * without EOF is treated as ending in one.
 * @internal
 */
export function current(state: ParserState): Token {
  const token = state.tokens[state.pos];
  if (token) return token;
  const last = state.tokens[state.tokens.length - 1];
  if (last?.type === TOKEN_TYPES.EOF) return last;
  return { type: TOKEN_TYPES.EOF, line: last?.line ?? 1 };
}

/** @internal */
export function isAtEnd(state: ParserState): boolean {
  return current(state).type === TOKEN_TYPES.EOF;
}

/** @internal */
export function check(state: ParserState, ...types: TokenType[]): boolean {
  return types.includes(current(state).type);
}

/** @internal */
export function advance(state: ParserState): Token {
  const token = current(state);
  if (!isAtEnd(state)) state.pos++;
  return token;
}

/**
 * Consume a token of the given type or throw a ParseError citing the token
 * found instead.
 * @internal
 */
export function expect(
  state: ParserState,
  type: TokenType,
  errorId: string,
  context: Record<string, unknown> = {}
): Token {
  if (check(state, type)) return advance(state);
  throw unexpectedToken(state, errorId, context);
}

/**
 * Build a ParseError for the current token.
 * @internal
 */
export function unexpectedToken(
  state: ParserState,
  errorId: string,
  context: Record<string, unknown> = {}
): ParseError {
  const token = current(state);
  return new ParseError(errorId, token.line, {
    ...context,
    found: describeToken(token),
  });
}

// ============================================================
// NESTING LIMITS
// ============================================================

function nestingTooDeep(line: number): ParseError {
  return new ParseError(LOX_ERROR_CODES.PARSE_NESTING_TOO_DEEP, line, {
    limit: MAX_EXPRESSION_DEPTH,
  });
}

/**
 * Run a recursive rule one nesting level deeper.
 * @throws ParseError once the limit is passed
 * @internal
 */
export function nested<T>(state: ParserState, rule: () => T): T {
  if (state.nesting >= MAX_EXPRESSION_DEPTH) {
    throw nestingTooDeep(current(state).line);
  }
  state.nesting++;
  try {
    return rule();
  } finally {
    state.nesting--;
  }
}

/**
 * Record the height of an operator node from its operands.
 * @throws ParseError if the tree grows past the limit
 * @internal
 */
export function withHeight<T extends ExpressionNode>(
  state: ParserState,
  node: T,
  ...operands: ExpressionNode[]
): T {
  let tallest = 0;
  for (const operand of operands) {
    tallest = Math.max(tallest, state.heights.get(operand) ?? 1);
  }
  if (tallest >= MAX_EXPRESSION_DEPTH) {
    throw nestingTooDeep(node.line);
  }
  state.heights.set(node, tallest + 1);
  return node;
}
