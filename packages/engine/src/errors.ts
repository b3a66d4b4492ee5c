/**
 * Error types for the template engine
 *
 * Every error carries the position of the construct that caused it, so
 * messages read `Error at line 3, column 5: ...` like the lexer and parser.
 */

import type { ExpressionError } from '@prompty/expressions';
import type { Position } from './lexer/token';

/**
 * Base class for engine errors
 */
export abstract class EngineError extends Error {
  readonly line: number;
  /** 0-based; messages show it 1-based */
  readonly column: number;
  readonly index: number;
  /** Message without the position prefix */
  readonly detail: string;

  constructor(message: string, position: Position | null = null, options?: ErrorOptions) {
    // Display 1-indexed column for user-facing error messages (editors show 1-indexed)
    super(
      position ? `Error at line ${position.line}, column ${position.column + 1}: ${message}` : message,
      options,
    );
    this.name = this.constructor.name;
    this.detail = message;
    this.line = position?.line ?? 0;
    this.column = position?.column ?? 0;
    this.index = position?.index ?? 0;
  }
}

/**
 * A resolver failed, was missing, or rejected its attributes
 */
export class ResolverError extends EngineError {
  readonly tagName: string;

  constructor(tagName: string, message: string, position: Position | null = null, cause?: unknown) {
    super(message, position, cause === undefined ? undefined : { cause });
    this.tagName = tagName;
  }
}

/**
 * An include would re-enter a template already being rendered
 */
export class CircularIncludeError extends ResolverError {
  readonly chain: readonly string[];

  constructor(chain: readonly string[], position: Position | null = null) {
    super('prompty.include', `Circular include: ${chain.join(' -> ')}`, position);
    this.chain = chain;
  }
}

/**
 * An `eval` expression failed to parse or evaluate
 */
export class ExpressionEvaluationError extends EngineError {
  readonly expression: string;

  constructor(expression: string, cause: ExpressionError, position: Position | null = null) {
    super(`Expression '${expression}' failed: ${cause.message}`, position, { cause });
    this.expression = expression;
  }
}

export type LimitName =
  | 'maxDepth'
  | 'maxLoopIterations'
  | 'maxOutputSize'
  | 'executionTimeout'
  | 'resolverTimeout'
  | 'functionTimeout';

/**
 * A configured resource limit was exceeded. Never handled by error strategies.
 */
export class ResourceLimitError extends EngineError {
  readonly limit: LimitName;

  constructor(limit: LimitName, message: string, position: Position | null = null) {
    super(message, position);
    this.limit = limit;
  }
}

/**
 * Execution was aborted through its AbortSignal
 */
export class CancellationError extends EngineError {
  constructor(reason?: unknown, position: Position | null = null) {
    super('Execution cancelled', position, reason === undefined ? undefined : { cause: reason });
  }
}

export type RegistrationKind = 'resolver' | 'template' | 'function';

/**
 * A resolver, template or function could not be registered or removed
 */
export class RegistrationError extends EngineError {
  readonly kind: RegistrationKind;
  readonly registrationName: string;

  constructor(kind: RegistrationKind, name: string, message: string, cause?: unknown) {
    super(message, null, cause === undefined ? undefined : { cause });
    this.kind = kind;
    this.registrationName = name;
  }
}

/**
 * Engine options failed validation
 */
export class ConfigurationError extends EngineError {
  /** `path: message` for each rejected option */
  readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super(`Invalid engine options: ${issues.join('; ')}`);
    this.issues = issues;
  }
}
