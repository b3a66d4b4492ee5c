export { DEFAULT_DELIMITERS, Lexer, RAW_TAGS } from './lexer';
export type { Delimiters } from './lexer';
export { LexerError } from './lexer-error';
export type { Position, SourceLocation, Token } from './token';
export { TokenType } from './token-types';
