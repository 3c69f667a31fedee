/**
 * Parser Extension: Program Parsing
 * Program, declarations, statements, and panic-mode recovery
 */

import { Parser } from './parser.js';
import type {
  DeclarationNode,
  ExpressionNode,
  ProgramNode,
  StatementNode,
  VarDeclNode,
} from '../types.js';
import { LOX_ERROR_CODES, ParseError, TOKEN_TYPES } from '../types.js';
import { advance, check, expect, isAtEnd } from './state.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseProgram(): ProgramNode;
    parseDeclaration(): DeclarationNode;
    parseVarDeclaration(): VarDeclNode;
    parseStatement(): StatementNode;
    expectSemicolon(statement: string): void;
    synchronize(): void;
  }
}

// ============================================================
// PROGRAM PARSING
// ============================================================

Parser.prototype.parseProgram = function (this: Parser): ProgramNode {
  const declarations: DeclarationNode[] = [];

  while (!isAtEnd(this.state)) {
    try {
      declarations.push(this.parseDeclaration());
    } catch (err) {
      if (!(err instanceof ParseError)) {
        throw err; // Re-throw non-parse errors
      }
      this.state.errors.push(err);
      this.synchronize();
    }
  }

  return { type: 'Program', declarations };
};

/**
 * Panic-mode recovery: discard tokens through the next `;`, or up to EOF.
 */
Parser.prototype.synchronize = function (this: Parser): void {
  while (!isAtEnd(this.state)) {
    if (advance(this.state).type === TOKEN_TYPES.SEMICOLON) {
      return;
    }
  }
};

// ============================================================
// DECLARATIONS
// ============================================================

Parser.prototype.parseDeclaration = function (
  this: Parser
): DeclarationNode {
  if (check(this.state, TOKEN_TYPES.VAR)) {
    return this.parseVarDeclaration();
  }
  return this.parseStatement();
};

/**
 * var IDENTIFIER "=" expression ";"
 */
Parser.prototype.parseVarDeclaration = function (this: Parser): VarDeclNode {
  const line = advance(this.state).line; // consume 'var'

  const name = this.parseIdentifier();
  expect(this.state, TOKEN_TYPES.EQUAL, LOX_ERROR_CODES.PARSE_EXPECTED_EQUAL);
  const initializer = this.parseExpression();
  this.expectSemicolon('variable declaration');

  return { type: 'VarDecl', name, initializer, line };
};

// ============================================================
// STATEMENTS
// ============================================================

Parser.prototype.parseStatement = function (this: Parser): StatementNode {
  if (check(this.state, TOKEN_TYPES.PRINT)) {
    const line = advance(this.state).line; // consume 'print'
    const expression = this.parseExpression();
    this.expectSemicolon('value');
    return { type: 'PrintStmt', expression, line };
  }

  const expression: ExpressionNode = this.parseExpression();
  this.expectSemicolon('expression');
  return { type: 'ExpressionStmt', expression, line: expression.line };
};

Parser.prototype.expectSemicolon = function (
  this: Parser,
  statement: string
): void {
  expect(
    this.state,
    TOKEN_TYPES.SEMICOLON,
    LOX_ERROR_CODES.PARSE_EXPECTED_SEMICOLON,
    { statement }
  );
};

