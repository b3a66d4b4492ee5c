/**
 * Error types for expressions
 *
 * All evaluation errors carry the expression string and, where known, the
 * position of the offending token.
 */

import type { SourcePosition } from './lexer/token';

/**
 * Base class for expression errors
 */
export abstract class ExpressionError extends Error {
  /** The expression that caused the error */
  readonly expression: string;
  /** Position where the error occurred (if available) */
  readonly position: SourcePosition | null;

  constructor(
    message: string,
    expression: string,
    position: SourcePosition | null = null,
    options?: ErrorOptions,
  ) {
    // Columns are stored 0-based and shown 1-based
    const fullMessage = position
      ? `${message} at line ${position.line}, column ${position.column + 1}`
      : message;
    super(fullMessage, options);
    this.name = this.constructor.name;
    this.expression = expression;
    this.position = position;
  }
}

/**
 * Thrown when expression syntax is invalid or uses a forbidden construct
 */
export class ExpressionSyntaxError extends ExpressionError {}

/**
 * Thrown when calling a function that is not registered
 */
export class ExpressionReferenceError extends ExpressionError {}

/**
 * Thrown for operands of the wrong type, e.g. ordering a string against a number
 */
export class ExpressionTypeError extends ExpressionError {}

/**
 * Thrown when a call passes fewer or more arguments than the function accepts
 */
export class ExpressionArityError extends ExpressionError {
  readonly functionName: string;
  readonly minArgs: number;
  /** -1 when the function is variadic */
  readonly maxArgs: number;
  readonly actual: number;

  constructor(
    functionName: string,
    minArgs: number,
    maxArgs: number,
    actual: number,
    expression: string,
    position: SourcePosition | null = null,
  ) {
    super(
      `${functionName}() expects ${describeArity(minArgs, maxArgs)}, got ${actual}`,
      expression,
      position,
    );
    this.functionName = functionName;
    this.minArgs = minArgs;
    this.maxArgs = maxArgs;
    this.actual = actual;
  }
}

/**
 * Wraps an error thrown by a function implementation
 */
export class ExpressionCallError extends ExpressionError {
  readonly functionName: string;

  constructor(
    functionName: string,
    cause: unknown,
    expression: string,
    position: SourcePosition | null = null,
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`${functionName}() failed: ${reason}`, expression, position, { cause });
    this.functionName = functionName;
  }
}

/**
 * Thrown when limits are exceeded (expression length, string literal length)
 */
export class ExpressionRangeError extends ExpressionError {}

/**
 * Thrown when a function call runs past the configured function timeout
 */
export class ExpressionTimeoutError extends ExpressionRangeError {
  readonly functionName: string;
  readonly timeoutMs: number;

  constructor(
    functionName: string,
    timeoutMs: number,
    expression: string,
    position: SourcePosition | null = null,
  ) {
    super(`${functionName}() exceeded the ${timeoutMs}ms function timeout`, expression, position);
    this.functionName = functionName;
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Thrown by a FunctionRegistry when a registration is rejected
 */
export class FunctionRegistryError extends Error {
  readonly functionName: string;

  constructor(message: string, functionName: string) {
    super(message);
    this.name = 'FunctionRegistryError';
    this.functionName = functionName;
  }
}

function describeArity(minArgs: number, maxArgs: number): string {
  if (maxArgs < 0) {
    return `at least ${minArgs} argument${minArgs === 1 ? '' : 's'}`;
  }
  if (minArgs === maxArgs) {
    return `${minArgs} argument${minArgs === 1 ? '' : 's'}`;
  }
  return `${minArgs} to ${maxArgs} arguments`;
}
