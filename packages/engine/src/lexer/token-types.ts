/**
 * Token types for the template lexer
 */

export const TokenType = {
  // Content
  TEXT: 'TEXT', // Plain text between tags
  RAW_TEXT: 'RAW_TEXT', // Verbatim body of prompty.raw / prompty.comment

  // Delimiters
  OPEN_TAG: 'OPEN_TAG', // {~
  OPEN_END_TAG: 'OPEN_END_TAG', // {~/
  CLOSE_TAG: 'CLOSE_TAG', // ~}
  SELF_CLOSE: 'SELF_CLOSE', // /~}

  // Tag contents
  TAG_NAME: 'TAG_NAME', // prompty.var, my-tag
  ATTR_NAME: 'ATTR_NAME', // name
  ATTR_VALUE: 'ATTR_VALUE', // "value" (quotes removed, escapes applied)

  // End of input
  EOF: 'EOF',
} as const;

export type TokenType = (typeof TokenType)[keyof typeof TokenType];
