/**
 * Built-in functions and the function registry
 */

import { collectionFunctions } from './collection';
import { createDateTimeFunctions } from './datetime';
import { FunctionRegistry, type ExpressionFunction } from './registry';
import { stringFunctions } from './string';
import { typeFunctions } from './type';
import { utilFunctions } from './util';

export { FunctionRegistry, VARIADIC } from './registry';
export type { CallOptions, ExpressionFunction } from './registry';

export interface FunctionRegistryOptions {
  /** Millisecond clock read by `now()` */
  clock?: () => number;
}

function createBuiltinFunctions(clock?: () => number): ExpressionFunction[] {
  return [
    ...stringFunctions,
    ...collectionFunctions,
    ...typeFunctions,
    ...utilFunctions,
    ...createDateTimeFunctions(clock),
  ];
}

/**
 * Every built-in function, grouped by family
 */
export const builtinFunctions: readonly ExpressionFunction[] = createBuiltinFunctions();

/**
 * Create a registry pre-loaded with the built-in functions
 *
 * @example
 * ```ts
 * const registry = createFunctionRegistry();
 * registry.call('upper', ['hi']); // => 'HI'
 * ```
 */
export function createFunctionRegistry(options: FunctionRegistryOptions = {}): FunctionRegistry {
  const registry = new FunctionRegistry();
  for (const fn of createBuiltinFunctions(options.clock)) {
    registry.registerBuiltin(fn);
  }
  return registry;
}
