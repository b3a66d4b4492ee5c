export type {
  BinaryExpression,
  CallExpression,
  Expression,
  Literal,
  LogicalExpression,
  Path,
  UnaryExpression,
} from './ast';
export { Parser } from './parser';
export { ParserError } from './parser-error';
