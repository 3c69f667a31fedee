/**
 * Runtime Tests: Value Utilities
 */

import { describe, expect, it } from 'vitest';
import {
  formatNumber,
  formatValue,
  inferType,
  valuesEqual,
} from '../../src/index.js';

describe('formatNumber', () => {
  it('prints integers without a decimal point', () => {
    expect(formatNumber(3)).toBe('3');
    expect(formatNumber(-42)).toBe('-42');
  });

  it('prints the shortest form of a 32-bit float', () => {
    expect(formatNumber(Math.fround(0.1))).toBe('0.1');
    expect(formatNumber(Math.fround(3.14))).toBe('3.14');
    expect(formatNumber(Math.fround(Math.fround(0.1) + Math.fround(0.2)))).toBe(
      '0.3'
    );
  });

  it('writes very small and very large values without an exponent', () => {
    expect(formatNumber(Math.fround(1e-7))).toBe('0.0000001');
    expect(formatNumber(Math.fround(1e23))).toBe('100000000000000000000000');
    expect(formatNumber(Math.fround(-1e23))).toBe('-100000000000000000000000');
    expect(formatNumber(Math.fround(1 / 3000000))).toBe('0.00000033333333');
  });

  it('prints infinities and NaN', () => {
    expect(formatNumber(Infinity)).toBe('inf');
    expect(formatNumber(-Infinity)).toBe('-inf');
    expect(formatNumber(NaN)).toBe('NaN');
  });

  it('keeps the sign of negative zero', () => {
    expect(formatNumber(-0)).toBe('-0');
  });

  it('falls back to full precision for values that are not 32-bit floats', () => {
    expect(formatNumber(0.1)).toBe('0.1');
    expect(formatNumber(1 / 3)).toBe(String(1 / 3));
    expect(formatNumber(1e-10)).toBe('0.0000000001');
  });
});

describe('formatValue', () => {
  it('prints each value type', () => {
    expect(formatValue('raw "text"')).toBe('raw "text"');
    expect(formatValue(true)).toBe('true');
    expect(formatValue(false)).toBe('false');
    expect(formatValue(null)).toBe('nil');
    expect(formatValue(2.5)).toBe('2.5');
  });
});

describe('inferType', () => {
  it('names each value type', () => {
    expect(inferType(1)).toBe('number');
    expect(inferType('')).toBe('string');
    expect(inferType(false)).toBe('boolean');
    expect(inferType(null)).toBe('nil');
  });
});

describe('valuesEqual', () => {
  it('compares values of one type', () => {
    expect(valuesEqual(1, 1)).toBe(true);
    expect(valuesEqual('a', 'b')).toBe(false);
    expect(valuesEqual(null, null)).toBe(true);
  });

  it('never equates values of different types', () => {
    expect(valuesEqual(0, false)).toBe(false);
    expect(valuesEqual('', null)).toBe(false);
    expect(valuesEqual(1, '1')).toBe(false);
  });
});
