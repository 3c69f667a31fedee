/**
 * Parser Extension: Expression Parsing
 * Precedence chain from equality down to unary
 */

import { Parser } from './parser.js';
import type {
  BinaryOp,
  ExpressionNode,
  TokenType,
  UnaryOp,
} from '../types.js';
import { TOKEN_TYPES } from '../types.js';
import { advance, current, nested, withHeight } from './state.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseExpression(): ExpressionNode;
    parseEquality(): ExpressionNode;
    parseComparison(): ExpressionNode;
    parseTerm(): ExpressionNode;
    parseFactor(): ExpressionNode;
    parseUnary(): ExpressionNode;
    parseBinaryLevel(
      operators: Readonly<Partial<Record<TokenType, BinaryOp>>>,
      operand: () => ExpressionNode
    ): ExpressionNode;
  }
}

// ============================================================
// OPERATOR TABLES
// ============================================================

const EQUALITY_OPS: Readonly<Partial<Record<TokenType, BinaryOp>>> = {
  [TOKEN_TYPES.EQUAL_EQUAL]: '==',
  [TOKEN_TYPES.BANG_EQUAL]: '!=',
};

const COMPARISON_OPS: Readonly<Partial<Record<TokenType, BinaryOp>>> = {
  [TOKEN_TYPES.GREATER]: '>',
  [TOKEN_TYPES.GREATER_EQUAL]: '>=',
  [TOKEN_TYPES.LESS]: '<',
  [TOKEN_TYPES.LESS_EQUAL]: '<=',
};

const TERM_OPS: Readonly<Partial<Record<TokenType, BinaryOp>>> = {
  [TOKEN_TYPES.PLUS]: '+',
  [TOKEN_TYPES.MINUS]: '-',
};

const FACTOR_OPS: Readonly<Partial<Record<TokenType, BinaryOp>>> = {
  [TOKEN_TYPES.STAR]: '*',
  [TOKEN_TYPES.SLASH]: '/',
};

const UNARY_OPS: Readonly<Partial<Record<TokenType, UnaryOp>>> = {
  [TOKEN_TYPES.MINUS]: '-',
  [TOKEN_TYPES.BANG]: '!',
};

// ============================================================
// PRECEDENCE CHAIN
// ============================================================

Parser.prototype.parseExpression = function (this: Parser): ExpressionNode {
  return this.parseEquality();
};

Parser.prototype.parseEquality = function (this: Parser): ExpressionNode {
  return this.parseBinaryLevel(EQUALITY_OPS, () => this.parseComparison());
};

Parser.prototype.parseComparison = function (this: Parser): ExpressionNode {
  return this.parseBinaryLevel(COMPARISON_OPS, () => this.parseTerm());
};

Parser.prototype.parseTerm = function (this: Parser): ExpressionNode {
  return this.parseBinaryLevel(TERM_OPS, () => this.parseFactor());
};

Parser.prototype.parseFactor = function (this: Parser): ExpressionNode {
  return this.parseBinaryLevel(FACTOR_OPS, () => this.parseUnary());
};

/**
 * Left-associative loop shared by every binary level:
 * `a - b - c` parses as `(a - b) - c`.
 * The node takes the line of its leftmost operand.
 */
Parser.prototype.parseBinaryLevel = function (
  this: Parser,
  operators: Readonly<Partial<Record<TokenType, BinaryOp>>>,
  operand: () => ExpressionNode
): ExpressionNode {
  let left = operand();

  for (;;) {
    const op = operators[current(this.state).type];
    if (op === undefined) return left;
    advance(this.state);
    const right = operand();
    left = withHeight(
      this.state,
      { type: 'BinaryExpr', op, left, right, line: left.line },
      left,
      right
    );
  }
};

/**
 * unary := ( "-" | "!" ) unary | primary
 * Right-recursive, so `- - x` nests. Nesting stops at MAX_EXPRESSION_DEPTH.
 */
Parser.prototype.parseUnary = function (this: Parser): ExpressionNode {
  const op = UNARY_OPS[current(this.state).type];
  if (op === undefined) {
    return this.parsePrimary();
  }

  const line = advance(this.state).line;
  const operand = nested(this.state, () => this.parseUnary());
  return withHeight(
    this.state,
    { type: 'UnaryExpr', op, operand, line },
    operand
  );
};
