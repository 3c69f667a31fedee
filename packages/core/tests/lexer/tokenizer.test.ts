/**
 * Scanner Tests
 * Token classes, line tracking, and error recovery
 */

import { describe, expect, it } from 'vitest';
import {
  ErrorState,
  ScanError,
  TOKEN_TYPES,
  tokenize,
  tokenizeWithRecovery,
  type Token,
} from '../../src/index.js';

/** Token types of a scan, EOF included */
function types(source: string): string[] {
  return tokenize(source).map((t) => t.type);
}

describe('tokenize', () => {
  describe('punctuation and operators', () => {
    it('scans every single-character token', () => {
      expect(types('(){},.-+;/*')).toEqual([
        'LPAREN',
        'RPAREN',
        'LBRACE',
        'RBRACE',
        'COMMA',
        'DOT',
        'MINUS',
        'PLUS',
        'SEMICOLON',
        'SLASH',
        'STAR',
        'EOF',
      ]);
    });

    it('scans one and two character operators', () => {
      expect(types('! != = == > >= < <=')).toEqual([
        'BANG',
        'BANG_EQUAL',
        'EQUAL',
        'EQUAL_EQUAL',
        'GREATER',
        'GREATER_EQUAL',
        'LESS',
        'LESS_EQUAL',
        'EOF',
      ]);
    });

    it('takes the longest operator without spaces', () => {
      expect(types('!==')).toEqual(['BANG_EQUAL', 'EQUAL', 'EOF']);
      expect(types('<==')).toEqual(['LESS_EQUAL', 'EQUAL', 'EOF']);
    });
  });

  describe('literals', () => {
    it('scans integer and decimal numbers', () => {
      const tokens = tokenize('12 3.5');
      expect(tokens[0]).toEqual({ type: 'NUMBER', value: 12, line: 1 });
      expect(tokens[1]).toEqual({ type: 'NUMBER', value: 3.5, line: 1 });
    });

    it('accepts a trailing decimal point', () => {
      expect(tokenize('7.')[0]).toEqual({ type: 'NUMBER', value: 7, line: 1 });
    });

    it('rounds number values to 32-bit floats', () => {
      expect(tokenize('0.1')[0]).toEqual({
        type: 'NUMBER',
        value: Math.fround(0.1),
        line: 1,
      });
    });

    it('scans a string without its quotes', () => {
      expect(tokenize('"hello world"')[0]).toEqual({
        type: 'STRING',
        value: 'hello world',
        line: 1,
      });
    });

    it('scans an empty string', () => {
      expect(tokenize('""')[0]).toEqual({ type: 'STRING', value: '', line: 1 });
    });

    it('keeps newlines inside strings', () => {
      const tokens = tokenize('"a\nb" x');
      expect(tokens[0]).toEqual({ type: 'STRING', value: 'a\nb', line: 1 });
      expect(tokens[1]).toEqual({ type: 'IDENTIFIER', value: 'x', line: 2 });
    });
  });

  describe('words', () => {
    it('scans identifiers with underscores', () => {
      expect(tokenize('_foo_bar')[0]).toEqual({
        type: 'IDENTIFIER',
        value: '_foo_bar',
        line: 1,
      });
    });

    it('ends a word at a digit', () => {
      const tokens = tokenize('abc123');
      expect(tokens[0]).toEqual({ type: 'IDENTIFIER', value: 'abc', line: 1 });
      expect(tokens[1]).toEqual({ type: 'NUMBER', value: 123, line: 1 });
    });

    it('recognizes every keyword', () => {
      expect(
        types(
          'and class else false fun for if nil or print return super this true var while'
        )
      ).toEqual([
        'AND',
        'CLASS',
        'ELSE',
        'FALSE',
        'FUN',
        'FOR',
        'IF',
        'NIL',
        'OR',
        'PRINT',
        'RETURN',
        'SUPER',
        'THIS',
        'TRUE',
        'VAR',
        'WHILE',
        'EOF',
      ]);
    });

    it('treats keywords as case sensitive', () => {
      expect(tokenize('Print')[0]).toEqual({
        type: 'IDENTIFIER',
        value: 'Print',
        line: 1,
      });
    });

    it('does not treat object prototype names as keywords', () => {
      expect(tokenize('constructor')[0]?.type).toBe(TOKEN_TYPES.IDENTIFIER);
    });
  });

  describe('whitespace and comments', () => {
    it('skips a line comment to the end of the line', () => {
      expect(types('1 // two three\n4')).toEqual(['NUMBER', 'NUMBER', 'EOF']);
    });

    it('scans a lone slash as division', () => {
      expect(types('6 / 2')).toEqual(['NUMBER', 'SLASH', 'NUMBER', 'EOF']);
    });

    it('returns only EOF for empty input', () => {
      expect(tokenize('')).toEqual([{ type: 'EOF', line: 1 }]);
    });
  });

  describe('line numbers', () => {
    it('counts lines across newlines', () => {
      const lines = tokenize('a\nb\n\nc').map((t: Token) => t.line);
      expect(lines).toEqual([1, 2, 4, 4]);
    });

    it('starts from the given line', () => {
      const tokens = tokenize('x;', 7);
      expect(tokens.map((t) => t.line)).toEqual([7, 7, 7]);
    });

    it('gives a multi-line string the line it starts on', () => {
      const tokens = tokenize('\n"one\ntwo\nthree";');
      expect(tokens[0]?.line).toBe(2);
      expect(tokens[1]).toEqual({ type: 'SEMICOLON', line: 4 });
    });
  });

  describe('errors', () => {
    it('throws a scan ErrorState for an unexpected character', () => {
      expect(() => tokenize('1 % 2')).toThrow(ErrorState);
    });

    it('reports the character and line', () => {
      try {
        tokenize('x\n@');
        expect.fail('expected a scan error');
      } catch (err) {
        expect(err).toBeInstanceOf(ErrorState);
        if (!(err instanceof ErrorState)) return;
        expect(err.phase).toBe('scan');
        expect(err.format()).toBe('[2]: unexpected character: @');
      }
    });
  });
});

describe('tokenizeWithRecovery', () => {
  it('continues past unexpected characters', () => {
    const result = tokenizeWithRecovery('1 # 2 $ 3');
    expect(result.success).toBe(false);
    expect(result.tokens.map((t) => t.type)).toEqual([
      'NUMBER',
      'NUMBER',
      'NUMBER',
      'EOF',
    ]);
    expect(result.errors.map((e) => e.message)).toEqual([
      'unexpected character: #',
      'unexpected character: $',
    ]);
  });

  it('reports a character outside the BMP once', () => {
    const result = tokenizeWithRecovery('print 1; \u{1F600}+');
    expect(result.tokens.map((t) => t.type)).toEqual([
      'PRINT',
      'NUMBER',
      'SEMICOLON',
      'PLUS',
      'EOF',
    ]);
    expect(result.errors.map((e) => e.message)).toEqual([
      'unexpected character: \u{1F600}',
    ]);
  });

  it('records a number with two decimal points', () => {
    const result = tokenizeWithRecovery('print 1.2.3;');
    expect(result.tokens.map((t) => t.type)).toEqual([
      'PRINT',
      'SEMICOLON',
      'EOF',
    ]);
    expect(result.errors).toHaveLength(1);
    expect(result.errors[0]?.errorId).toBe('LOX-S002');
    expect(result.errors[0]?.message).toBe('invalid number literal: 1.2.3');
  });

  it('records an unterminated string at its starting line', () => {
    const result = tokenizeWithRecovery('print 1;\nprint "abc\n;');
    expect(result.errors).toHaveLength(1);
    const [error] = result.errors;
    expect(error).toBeInstanceOf(ScanError);
    expect(error?.format()).toBe('[2]: unterminated string');
    expect(result.tokens.at(-1)).toEqual({ type: 'EOF', line: 3 });
  });

  it('accumulates errors of different kinds in source order', () => {
    const result = tokenizeWithRecovery('1..2 ? "open');
    expect(result.errors.map((e) => e.errorId)).toEqual([
      'LOX-S002',
      'LOX-S001',
      'LOX-S003',
    ]);
  });

  it('succeeds on valid input', () => {
    const result = tokenizeWithRecovery('var a = 1;');
    expect(result.success).toBe(true);
    expect(result.errors).toEqual([]);
  });
});
