import type { TokenType } from './token-types';

/**
 * Position in source code
 */
export interface Position {
  line: number; // Line number (1-based)
  column: number; // Column number (0-based)
  index: number; // Character index (0-based)
}

/**
 * Source location with start and end positions
 */
export interface SourceLocation {
  start: Position;
  end: Position;
}

/**
 * Token produced by lexer
 */
export interface Token {
  type: TokenType;
  value: string; // Lexeme, or the unescaped value for ATTR_VALUE
  loc: SourceLocation;
}
