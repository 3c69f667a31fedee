/**
 * Parser Extension: Literal Parsing
 * Primary expressions and identifiers
 */

import { Parser } from './parser.js';
import type { ExpressionNode, IdentifierNode } from '../types.js';
import { LOX_ERROR_CODES, TOKEN_TYPES } from '../types.js';
import {
  advance,
  current,
  expect,
  nested,
  unexpectedToken,
} from './state.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parsePrimary(): ExpressionNode;
    parseIdentifier(): IdentifierNode;
  }
}

// ============================================================
// PRIMARY EXPRESSIONS
// ============================================================

/**
 * primary := NUMBER | STRING | "true" | "false" | "nil"
 *          | IDENTIFIER | "(" expression ")"
 *
 * Grouping produces no node of its own; the inner expression is returned.
 */
Parser.prototype.parsePrimary = function (this: Parser): ExpressionNode {
  const token = current(this.state);
  const { line } = token;

  switch (token.type) {
    case TOKEN_TYPES.NUMBER:
      advance(this.state);
      return { type: 'NumberLiteral', value: token.value, line };
    case TOKEN_TYPES.STRING:
      advance(this.state);
      return { type: 'StringLiteral', value: token.value, line };
    case TOKEN_TYPES.IDENTIFIER:
      advance(this.state);
      return { type: 'Identifier', name: token.value, line };
    case TOKEN_TYPES.TRUE:
      advance(this.state);
      return { type: 'TrueLiteral', line };
    case TOKEN_TYPES.FALSE:
      advance(this.state);
      return { type: 'FalseLiteral', line };
    case TOKEN_TYPES.NIL:
      advance(this.state);
      return { type: 'NilLiteral', line };
    case TOKEN_TYPES.LPAREN: {
      advance(this.state);
      const inner = nested(this.state, () => this.parseExpression());
      expect(
        this.state,
        TOKEN_TYPES.RPAREN,
        LOX_ERROR_CODES.PARSE_EXPECTED_RPAREN
      );
      return inner;
    }
  }

  throw unexpectedToken(this.state, LOX_ERROR_CODES.PARSE_EXPECTED_EXPRESSION);
};

/** Variable name in a declaration */
Parser.prototype.parseIdentifier = function (this: Parser): IdentifierNode {
  const token = current(this.state);
  if (token.type !== TOKEN_TYPES.IDENTIFIER) {
    throw unexpectedToken(
      this.state,
      LOX_ERROR_CODES.PARSE_EXPECTED_VARIABLE_NAME
    );
  }
  advance(this.state);
  return { type: 'Identifier', name: token.value, line: token.line };
};
