/**
 * Runtime Values
 *
 * LoxValue and value utilities: type inference, equality, display.
 */

import type { LoxTypeName } from '../../types.js';

/**
 * Runtime value. Numbers are held at 32-bit float precision; `null` is nil.
 */
export type LoxValue = number | string | boolean | null;

/** Infer the type name of a runtime value */
export function inferType(value: LoxValue): LoxTypeName {
  if (value === null) return 'nil';
  if (typeof value === 'number') return 'number';
  if (typeof value === 'string') return 'string';
  return 'boolean';
}

/** Round to the nearest 32-bit float */
export function toFloat32(value: number): number {
  return Math.fround(value);
}

/**
 * Equality over any two values.
 * Values of different types are never equal; NaN is not equal to itself.
 */
export function valuesEqual(a: LoxValue, b: LoxValue): boolean {
  if (inferType(a) !== inferType(b)) return false;
  return a === b;
}

/**
 * Write a finite number in positional notation, never with an exponent.
 * The digits are the shortest that read back to the same double.
 *
 * @example
 * toPositional(1e-7) // "0.0000001"
 * toPositional(1e23) // "100000000000000000000000"
 */
function toPositional(value: number): string {
  const match = /^(-?)(\d)(?:\.(\d+))?e([+-]\d+)$/.exec(value.toExponential());
  if (!match) return String(value);

  const [, sign = '', lead = '', fraction = '', exponent = '0'] = match;
  const digits = lead + fraction;
  // Digits before the decimal point
  const point = Number(exponent) + 1;

  if (point <= 0) {
    return `${sign}0.${'0'.repeat(-point)}${digits}`;
  }
  if (point >= digits.length) {
    return `${sign}${digits}${'0'.repeat(point - digits.length)}`;
  }
  return `${sign}${digits.slice(0, point)}.${digits.slice(point)}`;
}

/**
 * Shortest decimal form that reads back to the same 32-bit float, written
 * as a number literal.
 *
 * @example
 * formatNumber(Math.fround(0.1)) // "0.1"
 * formatNumber(Math.fround(1e-7)) // "0.0000001"
 * formatNumber(-Infinity) // "-inf"
 */
export function formatNumber(value: number): string {
  if (Number.isNaN(value)) return 'NaN';
  if (value === Infinity) return 'inf';
  if (value === -Infinity) return '-inf';
  if (Object.is(value, -0)) return '-0';

  // 9 significant digits always identify a 32-bit float
  for (let precision = 1; precision <= 9; precision++) {
    const candidate = Number(value.toPrecision(precision));
    if (Math.fround(candidate) === value) {
      return toPositional(candidate);
    }
  }

  // Not a 32-bit float (e.g. a host-supplied variable)
  return toPositional(value);
}

/** Format a value for display */
export function formatValue(value: LoxValue): string {
  if (value === null) return 'nil';
  if (typeof value === 'number') return formatNumber(value);
  if (typeof value === 'boolean') return value ? 'true' : 'false';
  return value;
}
