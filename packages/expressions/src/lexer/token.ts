import type { TokenType } from './token-types';

/**
 * Position inside an expression string
 */
export interface SourcePosition {
  /** 1-based line number */
  line: number;
  /** 0-based column number */
  column: number;
  /** 0-based character offset */
  offset: number;
}

export interface SourceLocation {
  start: SourcePosition;
  end: SourcePosition;
}

/**
 * A token produced by the expression lexer
 */
export interface Token {
  type: TokenType;
  /** Source text, or the decoded value for string literals */
  value: string;
  loc: SourceLocation;
}
