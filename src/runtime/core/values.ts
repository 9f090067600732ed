/**
 * Runtime Values
 *
 * Value rendering, truthiness and equality for Lox values.
 */

import type { LoxValue } from '../../types.js';

export type { LoxValue };

/** Variant name of a value, used in trace output */
export type LoxTypeName = 'number' | 'string' | 'boolean' | 'nil';

export function typeName(value: LoxValue): LoxTypeName {
  if (value === null) return 'nil';
  switch (typeof value) {
    case 'number':
      return 'number';
    case 'string':
      return 'string';
    default:
      return 'boolean';
  }
}

/**
 * Debug representation written by `print` and used in diagnostics.
 * Strings are quoted with JSON escaping; `-0` keeps its sign.
 *
 * @example
 * inspectValue(0.5)    // '0.5'
 * inspectValue('a"b')  // '"a\\"b"'
 * inspectValue(null)   // 'nil'
 */
export function inspectValue(value: LoxValue): string {
  if (value === null) return 'nil';
  if (typeof value === 'string') return JSON.stringify(value);
  if (typeof value === 'number' && Object.is(value, -0)) return '-0';
  return String(value);
}

/**
 * Truthiness is only defined for booleans and nil.
 * Returns null for numbers and strings so callers can report the operand.
 */
export function isTruthy(value: LoxValue): boolean | null {
  if (value === null) return false;
  if (typeof value === 'boolean') return value;
  return null;
}

/**
 * Same variant and equal payload. Values of different variants are never
 * equal, and `NaN` is not equal to itself.
 */
export function valuesEqual(a: LoxValue, b: LoxValue): boolean {
  return a === b;
}
