import { isEmpty } from '../runtime/utils';
import { VARIADIC, type ExpressionFunction } from './registry';

/**
 * `default(x, fallback)`: fallback when x is nil or empty
 */
export function defaultValue(value: unknown, fallback: unknown): unknown {
  return isEmpty(value) ? fallback : value;
}

/**
 * First argument that is neither nil nor empty, else null
 */
export function coalesce(...values: unknown[]): unknown {
  for (const value of values) {
    if (!isEmpty(value)) {
      return value;
    }
  }
  return null;
}

export const utilFunctions: ExpressionFunction[] = [
  { name: 'default', minArgs: 2, maxArgs: 2, fn: ([v, f]) => defaultValue(v, f) },
  { name: 'coalesce', minArgs: 1, maxArgs: VARIADIC, fn: (args) => coalesce(...args) },
];
