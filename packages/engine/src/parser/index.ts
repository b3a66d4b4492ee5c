export type * from './ast-nodes';
export { Attributes } from './attributes';
export { Parser, TAG } from './parser';
export { ParserError } from './parser-error';
