export { Lexer } from './lexer';
export { LexerError } from './lexer-error';
export type { SourceLocation, SourcePosition, Token } from './token';
export { TokenType } from './token-types';
