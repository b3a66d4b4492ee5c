/**
 * @prompty/expressions
 *
 * Sandboxed expression language for template conditions. Expressions read
 * data and call registered functions; they cannot assign, loop or do
 * arithmetic.
 */

import { ExpressionRangeError } from './errors';
import { createFunctionRegistry, type FunctionRegistry } from './functions/index';
import { Interpreter } from './interpreter/interpreter';
import type { Expression } from './parser/ast';
import { Parser } from './parser/parser';
import { isTruthy } from './runtime/utils';
import { scopeFromObject, type Scope } from './scope';

export {
  ExpressionArityError,
  ExpressionCallError,
  ExpressionError,
  ExpressionRangeError,
  ExpressionReferenceError,
  ExpressionSyntaxError,
  ExpressionTimeoutError,
  ExpressionTypeError,
  FunctionRegistryError,
} from './errors';
export { LexerError } from './lexer/lexer-error';
export { ParserError } from './parser/parser-error';
export type { SourceLocation, SourcePosition } from './lexer/token';

export type {
  BinaryExpression,
  CallExpression,
  Expression,
  Literal,
  LogicalExpression,
  Path,
  UnaryExpression,
} from './parser/ast';
export {
  builtinFunctions,
  createFunctionRegistry,
  FunctionRegistry,
  VARIADIC,
} from './functions/index';
export type { CallOptions, ExpressionFunction, FunctionRegistryOptions } from './functions/index';
export { scopeFromObject } from './scope';
export type { Scope } from './scope';
export { isEmpty, isPlainObject, isTruthy, lookupProperty, resolvePath, sortedEntries, stringify } from './runtime/utils';
export { looseEquals } from './interpreter/interpreter';

/**
 * Default limits for expression evaluation
 */
export const DEFAULT_LIMITS = {
  /** Maximum expression length in characters */
  maxExpressionLength: 10_000,
  /** Maximum string literal length in characters */
  maxStringLength: 10_000,
} as const;

export type ExpressionLimits = { [K in keyof typeof DEFAULT_LIMITS]: number };

export interface ParseOptions {
  /** Override default limits (set to Infinity to disable) */
  limits?: Partial<ExpressionLimits>;
}

export interface EvaluateOptions extends ParseOptions {
  /** Function registry; defaults to one holding only the built-ins */
  functions?: FunctionRegistry;
  /** Milliseconds a single function call may take */
  functionTimeout?: number;
  /** Millisecond clock used for the function timeout */
  clock?: () => number;
}

/**
 * Compiled expression that can be evaluated multiple times
 */
export interface CompiledExpression {
  evaluate(scope?: Scope | Record<string, unknown>): unknown;
  readonly expression: string;
  readonly ast: Expression;
}

let defaultRegistry: FunctionRegistry | null = null;

function builtinRegistry(): FunctionRegistry {
  defaultRegistry ??= createFunctionRegistry();
  return defaultRegistry;
}

function toScope(scope: Scope | Record<string, unknown>): Scope {
  if (isScope(scope)) {
    return scope;
  }
  return scopeFromObject(scope);
}

function isScope(value: Scope | Record<string, unknown>): value is Scope {
  return typeof value.lookup === 'function';
}

function validateAstLimits(node: Expression, expression: string, limits: ExpressionLimits): void {
  switch (node.type) {
    case 'Literal':
      if (typeof node.value === 'string' && node.value.length > limits.maxStringLength) {
        throw new ExpressionRangeError(
          `String literal exceeds maximum length of ${limits.maxStringLength} characters`,
          expression,
          node.loc?.start ?? null,
        );
      }
      break;

    case 'BinaryExpression':
    case 'LogicalExpression':
      validateAstLimits(node.left, expression, limits);
      validateAstLimits(node.right, expression, limits);
      break;

    case 'UnaryExpression':
      validateAstLimits(node.argument, expression, limits);
      break;

    case 'CallExpression':
      for (const arg of node.arguments) {
        validateAstLimits(arg, expression, limits);
      }
      break;

    case 'Path':
      break;
  }
}

/**
 * Parse an expression string into an AST
 *
 * @throws {ExpressionSyntaxError} If the expression has invalid syntax
 * @throws {ExpressionRangeError} If the expression exceeds limits
 *
 * @example
 * ```ts
 * const ast = parse('user.age >= 18');
 * evaluateAst(ast, { user: { age: 21 } }); // => true
 * ```
 */
export function parse(expression: string, options: ParseOptions = {}): Expression {
  const limits: ExpressionLimits = { ...DEFAULT_LIMITS, ...options.limits };

  if (expression.length > limits.maxExpressionLength) {
    throw new ExpressionRangeError(
      `Expression exceeds maximum length of ${limits.maxExpressionLength} characters`,
      expression,
    );
  }

  const ast = new Parser().parse(expression);
  validateAstLimits(ast, expression, limits);
  return ast;
}

/**
 * Evaluate a pre-parsed AST
 *
 * @throws {ExpressionReferenceError} If an unknown function is called
 * @throws {ExpressionTypeError} If values of different types are ordered
 */
export function evaluateAst(
  ast: Expression,
  scope: Scope | Record<string, unknown> = {},
  options: EvaluateOptions & { expression?: string } = {},
): unknown {
  const interpreter = new Interpreter(options.functions ?? builtinRegistry(), {
    expression: options.expression,
    functionTimeout: options.functionTimeout,
    clock: options.clock,
  });
  return interpreter.evaluate(ast, toScope(scope));
}

/**
 * Evaluate an expression against a scope or plain data
 *
 * @example
 * ```ts
 * evaluate('len(items) > 0 && user.active', { items: [1], user: { active: true } });
 * // => true
 * ```
 */
export function evaluate(
  expression: string,
  scope: Scope | Record<string, unknown> = {},
  options: EvaluateOptions = {},
): unknown {
  const ast = parse(expression, options);
  return evaluateAst(ast, scope, { ...options, expression });
}

/**
 * Compile an expression for repeated evaluation
 *
 * @example
 * ```ts
 * const isAdult = compile('age >= 18');
 * isAdult.evaluate({ age: 30 }); // => true
 * isAdult.evaluate({ age: 12 }); // => false
 * ```
 */
export function compile(expression: string, options: EvaluateOptions = {}): CompiledExpression {
  const ast = parse(expression, options);

  return {
    expression,
    ast,
    evaluate(scope: Scope | Record<string, unknown> = {}): unknown {
      return evaluateAst(ast, scope, { ...options, expression });
    },
  };
}

/**
 * Evaluate an expression and reduce the result to a boolean
 */
export function evaluateCondition(
  expression: string,
  scope: Scope | Record<string, unknown> = {},
  options: EvaluateOptions = {},
): boolean {
  return isTruthy(evaluate(expression, scope, options));
}
