/**
 * Parser Class - Core
 *
 * Defines the Parser class structure. Methods are added via prototype
 * extension from separate modules, using TypeScript declaration merging
 * for type safety.
 */

import type { ParseError, ProgramNode, Token } from '../types.js';
import { type ParserState, createParserState } from './state.js';

/**
 * Parser class that converts tokens into an AST.
 *
 * Methods are organized across multiple files:
 * - parser-program.ts: Program, declarations, statements, recovery
 * - parser-expr.ts: Precedence chain (equality down to unary)
 * - parser-literals.ts: Primary expressions and the identifier rule
 *
 * @example
 * ```typescript
 * const parser = new Parser(tokens);
 * const program = parser.parse();
 * if (parser.errors.length > 0) { ... }
 * ```
 */
export class Parser {
  /** Parser state including tokens, position, and error collection */
  state: ParserState;

  constructor(tokens: readonly Token[]) {
    this.state = createParserState(tokens);
  }

  /**
   * Parse tokens into a program. Declarations that fail to parse are
   * left out of the result and recorded in `errors`.
   */
  parse(): ProgramNode {
    return this.parseProgram();
  }

  /** Errors collected while parsing */
  get errors(): ParseError[] {
    return this.state.errors;
  }
}
