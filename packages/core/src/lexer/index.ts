/**
 * Lexer Module
 * Converts source text into tokens
 */

export { ScanError } from './errors.js';
export { createLexerState, type LexerState } from './state.js';
export {
  nextToken,
  tokenize,
  tokenizeWithRecovery,
  type TokenizeResult,
} from './tokenizer.js';
