/**
 * Collection functions for expressions
 */

import { isNil, isPlainObject, sizeOf, sortedEntries } from '../runtime/utils';
import type { ExpressionFunction } from './registry';

function requireArray(value: unknown, fnName: string): unknown[] {
  if (isNil(value)) {
    return [];
  }
  if (!Array.isArray(value)) {
    throw new TypeError(`${fnName}() requires an array`);
  }
  return value;
}

function requireMap(value: unknown, fnName: string): Map<unknown, unknown> | Record<string, unknown> {
  if (value instanceof Map || isPlainObject(value)) {
    return value;
  }
  throw new TypeError(`${fnName}() requires an object`);
}

/**
 * Length of a string, array, Map or object; 0 for nil
 */
export function len(value: unknown): number {
  if (isNil(value)) {
    return 0;
  }
  const size = sizeOf(value);
  if (size === null) {
    throw new TypeError('len() requires a string, array or object');
  }
  return size;
}

/** First element, or null when empty */
export function first(arr: unknown): unknown {
  const items = requireArray(arr, 'first');
  return items.length > 0 ? items[0] : null;
}

/** Last element, or null when empty */
export function last(arr: unknown): unknown {
  const items = requireArray(arr, 'last');
  return items.length > 0 ? items[items.length - 1] : null;
}

/** Keys in sorted order */
export function keys(obj: unknown): string[] {
  return sortedEntries(requireMap(obj, 'keys')).map(([key]) => key);
}

/** Values ordered by their sorted keys */
export function values(obj: unknown): unknown[] {
  return sortedEntries(requireMap(obj, 'values')).map(([, value]) => value);
}

export function has(obj: unknown, key: unknown): boolean {
  const target = requireMap(obj, 'has');
  if (typeof key !== 'string') {
    throw new TypeError('has() requires a string key');
  }
  if (target instanceof Map) {
    return target.has(key);
  }
  return Object.prototype.hasOwnProperty.call(target, key);
}

export const collectionFunctions: ExpressionFunction[] = [
  { name: 'len', minArgs: 1, maxArgs: 1, fn: ([v]) => len(v) },
  { name: 'first', minArgs: 1, maxArgs: 1, fn: ([v]) => first(v) },
  { name: 'last', minArgs: 1, maxArgs: 1, fn: ([v]) => last(v) },
  { name: 'keys', minArgs: 1, maxArgs: 1, fn: ([v]) => keys(v) },
  { name: 'values', minArgs: 1, maxArgs: 1, fn: ([v]) => values(v) },
  { name: 'has', minArgs: 2, maxArgs: 2, fn: ([o, k]) => has(o, k) },
];
