import { resolvePath } from './runtime/utils';

/**
 * Variable source for expression evaluation
 *
 * `lookup` receives the dotted path split into parts and returns
 * `undefined` when nothing is bound there.
 */
export interface Scope {
  lookup(path: readonly string[]): unknown;
}

/**
 * Adapt plain data to a Scope
 *
 * @example
 * ```ts
 * const scope = scopeFromObject({ user: { name: 'Alice' } });
 * scope.lookup(['user', 'name']); // => 'Alice'
 * ```
 */
export function scopeFromObject(data: Record<string, unknown> | Map<string, unknown>): Scope {
  return {
    lookup: (path) => resolvePath(data, path),
  };
}
