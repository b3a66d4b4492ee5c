/**
 * Token types for the expression lexer
 *
 * The grammar is deliberately small: literals, dotted paths, comparisons,
 * logical operators and calls to registered functions.
 */

export const TokenType = {
  // Literals
  STRING: 'STRING', // 'hello' or "world"
  NUMBER: 'NUMBER', // 42, 3.14
  BOOLEAN: 'BOOLEAN', // true, false
  NULL: 'NULL', // null, nil

  // Identifiers
  IDENTIFIER: 'IDENTIFIER', // user, items

  // Comparison operators
  EQ: 'EQ', // ==
  NEQ: 'NEQ', // !=
  GT: 'GT', // >
  GTE: 'GTE', // >=
  LT: 'LT', // <
  LTE: 'LTE', // <=

  // Logical operators
  AND: 'AND', // &&
  OR: 'OR', // ||
  NOT: 'NOT', // !

  // Punctuation
  LPAREN: 'LPAREN', // (
  RPAREN: 'RPAREN', // )
  COMMA: 'COMMA', // ,
  DOT: 'DOT', // .
  MINUS: 'MINUS', // - (negative number literals only)

  // End of input
  EOF: 'EOF',
} as const;

export type TokenType = (typeof TokenType)[keyof typeof TokenType];
