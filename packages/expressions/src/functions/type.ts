/**
 * Type conversion and inspection functions for expressions
 */

import { isEmpty as isEmptyValue, isNil as isNilValue, isTruthy, stringify } from '../runtime/utils';
import type { ExpressionFunction } from './registry';

const INTEGER = /^[+-]?\d+$/;
const FLOAT = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

export function toString(value: unknown): string {
  return stringify(value);
}

/**
 * Convert to an integer, truncating floats
 * @throws If a string is not an integer literal, or the value is a collection
 */
export function toInt(value: unknown): number {
  if (isNilValue(value)) return 0;
  if (typeof value === 'boolean') return value ? 1 : 0;
  if (typeof value === 'number') return Math.trunc(value);
  if (typeof value === 'string') {
    const text = value.trim();
    if (!INTEGER.test(text)) {
      throw new TypeError(`toInt() cannot convert '${value}'`);
    }
    return parseInt(text, 10);
  }
  throw new TypeError('toInt() cannot convert this value');
}

/**
 * Convert to a float
 * @throws If a string is not a number literal, or the value is a collection
 */
export function toFloat(value: unknown): number {
  if (isNilValue(value)) return 0;
  if (typeof value === 'boolean') return value ? 1 : 0;
  if (typeof value === 'number') return value;
  if (typeof value === 'string') {
    const text = value.trim();
    if (!FLOAT.test(text)) {
      throw new TypeError(`toFloat() cannot convert '${value}'`);
    }
    return parseFloat(text);
  }
  throw new TypeError('toFloat() cannot convert this value');
}

export function toBool(value: unknown): boolean {
  return isTruthy(value);
}

/**
 * Type name: nil, string, number, boolean, date, array, map or object
 */
export function typeOf(value: unknown): string {
  if (isNilValue(value)) return 'nil';
  if (Array.isArray(value)) return 'array';
  if (value instanceof Map) return 'map';
  if (value instanceof Date) return 'date';
  return typeof value;
}

export function isNil(value: unknown): boolean {
  return isNilValue(value);
}

export function isEmpty(value: unknown): boolean {
  return isEmptyValue(value);
}

export const typeFunctions: ExpressionFunction[] = [
  { name: 'toString', minArgs: 1, maxArgs: 1, fn: ([v]) => toString(v) },
  { name: 'toInt', minArgs: 1, maxArgs: 1, fn: ([v]) => toInt(v) },
  { name: 'toFloat', minArgs: 1, maxArgs: 1, fn: ([v]) => toFloat(v) },
  { name: 'toBool', minArgs: 1, maxArgs: 1, fn: ([v]) => toBool(v) },
  { name: 'typeOf', minArgs: 1, maxArgs: 1, fn: ([v]) => typeOf(v) },
  { name: 'isNil', minArgs: 1, maxArgs: 1, fn: ([v]) => isNil(v) },
  { name: 'isEmpty', minArgs: 1, maxArgs: 1, fn: ([v]) => isEmpty(v) },
];
