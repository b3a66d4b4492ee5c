import type { SourceLocation } from '../lexer/token';

interface BaseNode {
  loc: SourceLocation | null;
}

/**
 * Literal value: string, number, boolean, or null
 */
export interface Literal extends BaseNode {
  type: 'Literal';
  value: string | number | boolean | null;
}

/**
 * Dotted variable reference: `user.profile.name`
 */
export interface Path extends BaseNode {
  type: 'Path';
  parts: string[];
  /** Source text of the path, used in error messages */
  original: string;
}

export interface BinaryExpression extends BaseNode {
  type: 'BinaryExpression';
  operator: '==' | '!=' | '>' | '>=' | '<' | '<=';
  left: Expression;
  right: Expression;
}

/**
 * Short-circuit `&&` / `||`; always produces a boolean
 */
export interface LogicalExpression extends BaseNode {
  type: 'LogicalExpression';
  operator: '&&' | '||';
  left: Expression;
  right: Expression;
}

export interface UnaryExpression extends BaseNode {
  type: 'UnaryExpression';
  operator: '!';
  argument: Expression;
}

/**
 * Call to a registered function: `len(items)`
 */
export interface CallExpression extends BaseNode {
  type: 'CallExpression';
  callee: string;
  arguments: Expression[];
}

export type Expression =
  | Literal
  | Path
  | BinaryExpression
  | LogicalExpression
  | UnaryExpression
  | CallExpression;
