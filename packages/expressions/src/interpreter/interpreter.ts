import { ExpressionTypeError } from '../errors';
import type { FunctionRegistry } from '../functions/registry';
import type {
  BinaryExpression,
  CallExpression,
  Expression,
  LogicalExpression,
  UnaryExpression,
} from '../parser/ast';
import { isNil, isTruthy } from '../runtime/utils';
import type { Scope } from '../scope';

export interface InterpreterOptions {
  /** Source text, used in error messages */
  expression?: string;
  functionTimeout?: number;
  clock?: () => number;
}

/**
 * Tree-walking interpreter for expression ASTs
 *
 * Evaluation is side-effect free apart from calls into registered functions.
 */
export class Interpreter {
  private readonly functions: FunctionRegistry;
  private readonly options: InterpreterOptions;

  constructor(functions: FunctionRegistry, options: InterpreterOptions = {}) {
    this.functions = functions;
    this.options = options;
  }

  evaluate(node: Expression, scope: Scope): unknown {
    switch (node.type) {
      case 'Literal':
        return node.value;
      case 'Path':
        return scope.lookup(node.parts);
      case 'BinaryExpression':
        return this.evaluateBinaryExpression(node, scope);
      case 'LogicalExpression':
        return this.evaluateLogicalExpression(node, scope);
      case 'UnaryExpression':
        return this.evaluateUnaryExpression(node, scope);
      case 'CallExpression':
        return this.evaluateCallExpression(node, scope);
    }
  }

  private get expression(): string {
    return this.options.expression ?? '<ast>';
  }

  private evaluateBinaryExpression(node: BinaryExpression, scope: Scope): boolean {
    const left = this.evaluate(node.left, scope);
    const right = this.evaluate(node.right, scope);

    switch (node.operator) {
      case '==':
        return looseEquals(left, right);
      case '!=':
        return !looseEquals(left, right);
    }

    if (typeof left === 'number' && typeof right === 'number') {
      return applyOrdering(node.operator, left < right ? -1 : left > right ? 1 : 0);
    }
    if (typeof left === 'string' && typeof right === 'string') {
      return applyOrdering(node.operator, left < right ? -1 : left > right ? 1 : 0);
    }

    throw new ExpressionTypeError(
      `Cannot compare ${describeType(left)} and ${describeType(right)} with '${node.operator}'`,
      this.expression,
      node.loc?.start ?? null,
    );
  }

  private evaluateLogicalExpression(node: LogicalExpression, scope: Scope): boolean {
    const left = isTruthy(this.evaluate(node.left, scope));

    if (node.operator === '&&') {
      return left && isTruthy(this.evaluate(node.right, scope));
    }
    return left || isTruthy(this.evaluate(node.right, scope));
  }

  private evaluateUnaryExpression(node: UnaryExpression, scope: Scope): boolean {
    return !isTruthy(this.evaluate(node.argument, scope));
  }

  private evaluateCallExpression(node: CallExpression, scope: Scope): unknown {
    const args = node.arguments.map((arg) => this.evaluate(arg, scope));
    return this.functions.call(node.callee, args, {
      expression: this.expression,
      position: node.loc?.start ?? null,
      functionTimeout: this.options.functionTimeout,
      clock: this.options.clock,
    });
  }
}

/**
 * Equality without coercion. Nil equals nil; values of different types are
 * never equal; arrays and objects compare by reference.
 */
export function looseEquals(left: unknown, right: unknown): boolean {
  if (isNil(left) || isNil(right)) {
    return isNil(left) && isNil(right);
  }
  return left === right;
}

function applyOrdering(operator: '>' | '>=' | '<' | '<=', order: number): boolean {
  switch (operator) {
    case '>':
      return order > 0;
    case '>=':
      return order >= 0;
    case '<':
      return order < 0;
    case '<=':
      return order <= 0;
  }
}

function describeType(value: unknown): string {
  if (isNil(value)) return 'nil';
  if (Array.isArray(value)) return 'array';
  if (value instanceof Map) return 'map';
  return typeof value;
}
