/**
 * Parser Module
 * Converts tokens into an AST
 */

import type { ParseError, ProgramNode, Token } from '../types.js';
import { ErrorState } from '../types.js';
import { tokenize } from '../lexer/index.js';
import { Parser } from './parser.js';

// Extension modules attach their methods to Parser.prototype
import './parser-program.js';
import './parser-expr.js';
import './parser-literals.js';

export { Parser } from './parser.js';

/**
 * Result of parsing with recovery.
 * Holds every declaration that parsed and every error encountered.
 */
export interface ParseResult {
  /** Declarations that parsed; failed ones are omitted */
  readonly ast: ProgramNode;
  /** Parse errors in source order (empty if none) */
  readonly errors: ParseError[];
  /** True if parsing completed without errors */
  readonly success: boolean;
}

/**
 * Parse tokens, recovering at declaration boundaries.
 */
export function parseWithRecovery(tokens: readonly Token[]): ParseResult {
  const parser = new Parser(tokens);
  const ast = parser.parse();
  return {
    ast,
    errors: parser.errors,
    success: parser.errors.length === 0,
  };
}

/**
 * Parse tokens into a program.
 *
 * @throws ErrorState (parse) holding every parse error found
 */
export function parse(tokens: readonly Token[]): ProgramNode {
  const { ast, errors } = parseWithRecovery(tokens);
  if (errors.length > 0) {
    throw ErrorState.parse(errors);
  }
  return ast;
}

/**
 * Scan and parse source text.
 *
 * @throws ErrorState (scan) if scanning fails, otherwise ErrorState (parse)
 */
export function parseSource(source: string, startLine = 1): ProgramNode {
  return parse(tokenize(source, startLine));
}
