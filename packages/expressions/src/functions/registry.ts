import {
  ExpressionArityError,
  ExpressionCallError,
  ExpressionReferenceError,
  ExpressionTimeoutError,
  FunctionRegistryError,
} from '../errors';
import type { SourcePosition } from '../lexer/token';

/** `maxArgs` value for functions that accept any number of trailing arguments */
export const VARIADIC = -1;

const FUNCTION_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * A function callable from expressions
 *
 * @example
 * ```ts
 * registry.register({
 *   name: 'greet',
 *   minArgs: 1,
 *   maxArgs: 1,
 *   fn: ([name]) => `Hello, ${String(name)}`,
 * });
 * ```
 */
export interface ExpressionFunction {
  name: string;
  minArgs: number;
  /** Upper bound on arguments, or VARIADIC */
  maxArgs: number;
  fn(args: unknown[]): unknown;
}

export interface CallOptions {
  /** Source expression, for error messages */
  expression?: string;
  position?: SourcePosition | null;
  /** Milliseconds a single call may take; Infinity disables the check */
  functionTimeout?: number;
  /** Millisecond clock used to time calls */
  clock?: () => number;
}

/**
 * Named functions available to expressions
 *
 * The first registration of a name wins; registering it again is an error.
 * Built-in functions cannot be unregistered.
 */
export class FunctionRegistry {
  private readonly functions = new Map<string, ExpressionFunction>();
  private readonly builtins = new Set<string>();

  register(fn: ExpressionFunction): void {
    this.add(fn, false);
  }

  /** @internal used to load the built-in set */
  registerBuiltin(fn: ExpressionFunction): void {
    this.add(fn, true);
  }

  /**
   * Remove a user-registered function
   *
   * @returns false when no function has that name
   * @throws {FunctionRegistryError} For built-in functions
   */
  unregister(name: string): boolean {
    if (this.builtins.has(name)) {
      throw new FunctionRegistryError(`Cannot unregister built-in function '${name}'`, name);
    }
    return this.functions.delete(name);
  }

  has(name: string): boolean {
    return this.functions.has(name);
  }

  get(name: string): ExpressionFunction | undefined {
    return this.functions.get(name);
  }

  isBuiltin(name: string): boolean {
    return this.builtins.has(name);
  }

  /** Registered names, sorted */
  list(): string[] {
    return [...this.functions.keys()].sort();
  }

  count(): number {
    return this.functions.size;
  }

  /**
   * Invoke a function by name after checking its arity
   *
   * @throws {ExpressionReferenceError} Unknown function
   * @throws {ExpressionArityError} Wrong number of arguments
   * @throws {ExpressionCallError} The implementation threw
   * @throws {ExpressionTimeoutError} The call outlasted `functionTimeout`
   */
  call(name: string, args: unknown[], options: CallOptions = {}): unknown {
    const expression = options.expression ?? name;
    const position = options.position ?? null;
    const fn = this.functions.get(name);

    if (!fn) {
      throw new ExpressionReferenceError(`Unknown function: ${name}`, expression, position);
    }

    if (args.length < fn.minArgs || (fn.maxArgs !== VARIADIC && args.length > fn.maxArgs)) {
      throw new ExpressionArityError(
        name,
        fn.minArgs,
        fn.maxArgs,
        args.length,
        expression,
        position,
      );
    }

    const clock = options.clock ?? Date.now;
    const timeout = options.functionTimeout ?? Infinity;
    const started = clock();

    let result: unknown;
    try {
      result = fn.fn(args);
    } catch (error) {
      throw new ExpressionCallError(name, error, expression, position);
    }

    if (clock() - started > timeout) {
      throw new ExpressionTimeoutError(name, timeout, expression, position);
    }

    return result;
  }

  private add(fn: ExpressionFunction, builtin: boolean): void {
    if (!fn.name) {
      throw new FunctionRegistryError('Function name must not be empty', '');
    }
    if (!FUNCTION_NAME.test(fn.name)) {
      throw new FunctionRegistryError(`Invalid function name '${fn.name}'`, fn.name);
    }
    if (!Number.isInteger(fn.minArgs) || fn.minArgs < 0) {
      throw new FunctionRegistryError(
        `Function '${fn.name}' has an invalid minArgs (${fn.minArgs})`,
        fn.name,
      );
    }
    if (fn.maxArgs !== VARIADIC && (!Number.isInteger(fn.maxArgs) || fn.maxArgs < fn.minArgs)) {
      throw new FunctionRegistryError(
        `Function '${fn.name}' has an invalid maxArgs (${fn.maxArgs})`,
        fn.name,
      );
    }
    if (this.functions.has(fn.name)) {
      throw new FunctionRegistryError(`Function '${fn.name}' is already registered`, fn.name);
    }

    this.functions.set(fn.name, fn);
    if (builtin) {
      this.builtins.add(fn.name);
    }
  }
}
