import { LexerError } from './lexer-error';
import type { Position, Token } from './token';
import { TokenType } from './token-types';

/**
 * Tag delimiters. Self-closing tags end with `'/' + close`, closing tags
 * start with `open + '/'` and `'\\' + open` is a literal `open` in text.
 */
export interface Delimiters {
  open: string;
  close: string;
}

export const DEFAULT_DELIMITERS: Readonly<Delimiters> = Object.freeze({ open: '{~', close: '~}' });

/**
 * Block tags whose body is captured verbatim instead of being tokenized
 */
export const RAW_TAGS: ReadonlySet<string> = new Set(['prompty.raw', 'prompty.comment']);

/**
 * Lexer states for template scanning
 */
const STATE_CONTENT = 0; // Scanning plain text
const STATE_TAG = 1; // Inside tag delimiters

type LexerState = typeof STATE_CONTENT | typeof STATE_TAG;

/**
 * Lexer for prompty templates
 *
 * Produces TEXT for plain content, a delimiter/name/attribute sequence for
 * each tag, and a single RAW_TEXT token for the body of raw and comment
 * blocks.
 */
export class Lexer {
  private readonly open: string;
  private readonly close: string;
  private readonly selfClose: string;
  private readonly endOpen: string;
  private readonly escape: string;

  private input: string = '';
  private index: number = 0;
  private line: number = 1;
  private column: number = 0;
  private state: LexerState = STATE_CONTENT;

  // Current tag bookkeeping
  private tagStart: Position | null = null;
  private tagName: string | null = null;
  private inEndTag: boolean = false;
  private expectTagName: boolean = false;
  private expectAttrValue: string | null = null;

  // Set after the open tag of a raw block; the next token is its body
  private pendingRaw: { name: string; start: Position } | null = null;

  constructor(delimiters: Delimiters = DEFAULT_DELIMITERS) {
    if (!delimiters.open || !delimiters.close) {
      throw new Error('Delimiters must be non-empty');
    }
    this.open = delimiters.open;
    this.close = delimiters.close;
    this.selfClose = '/' + delimiters.close;
    this.endOpen = delimiters.open + '/';
    this.escape = '\\' + delimiters.open;
  }

  /**
   * Initialize lexer with template string
   */
  setInput(template: string): void {
    this.input = template;
    this.index = 0;
    this.line = 1;
    this.column = 0;
    this.state = STATE_CONTENT;
    this.tagStart = null;
    this.tagName = null;
    this.inEndTag = false;
    this.expectTagName = false;
    this.expectAttrValue = null;
    this.pendingRaw = null;
  }

  /**
   * Extract next token from input
   * Returns EOF token when end of input is reached
   */
  lex(): Token {
    if (this.pendingRaw) {
      return this.scanRawBody(this.pendingRaw.name, this.pendingRaw.start);
    }

    if (this.state === STATE_TAG) {
      return this.scanTagToken();
    }

    if (this.isEOF()) {
      return this.createEOFToken();
    }

    if (this.match(this.endOpen)) {
      return this.enterTag(TokenType.OPEN_END_TAG, this.endOpen);
    }

    if (this.match(this.open)) {
      return this.enterTag(TokenType.OPEN_TAG, this.open);
    }

    return this.scanText();
  }

  /**
   * Convenience method to tokenize an entire template string
   * @returns Array of all tokens including EOF token
   */
  tokenize(template: string): Token[] {
    this.setInput(template);
    const tokens: Token[] = [];

    for (;;) {
      const token = this.lex();
      tokens.push(token);
      if (token.type === TokenType.EOF) {
        return tokens;
      }
    }
  }

  private enterTag(type: TokenType, delimiter: string): Token {
    const start = this.getPosition();
    this.consumeChars(delimiter.length);
    this.state = STATE_TAG;
    this.tagStart = start;
    this.tagName = null;
    this.inEndTag = type === TokenType.OPEN_END_TAG;
    this.expectTagName = true;
    this.expectAttrValue = null;
    return this.createToken(type, delimiter, start);
  }

  /**
   * Scan plain text up to the next unescaped open delimiter
   */
  private scanText(): Token {
    const start = this.getPosition();
    let value = '';

    while (!this.isEOF()) {
      if (this.match(this.escape)) {
        this.advance(); // backslash
        value += this.consumeChars(this.open.length);
        continue;
      }
      if (this.match(this.open)) {
        break;
      }
      value += this.advance();
    }

    return this.createToken(TokenType.TEXT, value, start);
  }

  private scanTagToken(): Token {
    this.skipWhitespace();

    if (this.isEOF()) {
      throw new LexerError('Unterminated tag', this.tagStart ?? this.getPosition());
    }

    if (this.expectTagName) {
      this.expectTagName = false;
      return this.scanTagName();
    }

    if (this.expectAttrValue !== null) {
      return this.scanAttributeValue(this.expectAttrValue);
    }

    if (this.match(this.selfClose)) {
      if (this.inEndTag) {
        throw new LexerError(`Unexpected '${this.selfClose}' in closing tag`, this.getPosition());
      }
      return this.leaveTag(TokenType.SELF_CLOSE, this.selfClose);
    }

    if (this.match(this.close)) {
      const token = this.leaveTag(TokenType.CLOSE_TAG, this.close);
      if (!this.inEndTag && this.tagName !== null && RAW_TAGS.has(this.tagName) && this.tagStart) {
        this.pendingRaw = { name: this.tagName, start: this.tagStart };
      }
      return token;
    }

    const char = this.peek();
    if (this.isNameStart(char)) {
      if (this.inEndTag) {
        throw new LexerError('Closing tags cannot have attributes', this.getPosition());
      }
      return this.scanAttributeName();
    }

    throw new LexerError(`Unexpected character '${char}' in tag`, this.getPosition());
  }

  private leaveTag(type: TokenType, delimiter: string): Token {
    const start = this.getPosition();
    this.consumeChars(delimiter.length);
    this.state = STATE_CONTENT;
    return this.createToken(type, delimiter, start);
  }

  /**
   * Tag names start with a letter or underscore and may contain letters,
   * digits, `_`, `-` and `.`
   */
  private scanTagName(): Token {
    const start = this.getPosition();

    if (!this.isNameStart(this.peek())) {
      throw new LexerError(`Invalid tag name starting with '${this.peek()}'`, start);
    }

    let value = '';
    while (!this.isEOF() && (this.isNameChar(this.peek()) || this.peek() === '.')) {
      value += this.advance();
    }

    if (value.endsWith('.')) {
      throw new LexerError(`Invalid tag name '${value}'`, start);
    }

    this.tagName = value;
    return this.createToken(TokenType.TAG_NAME, value, start);
  }

  private scanAttributeName(): Token {
    const start = this.getPosition();
    let value = '';

    while (!this.isEOF() && this.isNameChar(this.peek())) {
      value += this.advance();
    }

    this.expectAttrValue = value;
    return this.createToken(TokenType.ATTR_NAME, value, start);
  }

  /**
   * Scan `= "value"` after an attribute name
   */
  private scanAttributeValue(name: string): Token {
    if (this.peek() !== '=') {
      throw new LexerError(`Expected '=' after attribute '${name}'`, this.getPosition());
    }
    this.advance();
    this.skipWhitespace();

    const quote = this.peek();
    if (quote !== '"' && quote !== "'") {
      throw new LexerError(`Expected quoted value for attribute '${name}'`, this.getPosition());
    }

    this.expectAttrValue = null;
    return this.scanString();
  }

  /**
   * Scan a quoted string. A backslash escapes the active quote or another
   * backslash; any other backslash is kept.
   */
  private scanString(): Token {
    const start = this.getPosition();
    const quote = this.advance();
    let value = '';

    while (!this.isEOF() && this.peek() !== quote) {
      const char = this.advance();
      if (char === '\\' && (this.peek() === quote || this.peek() === '\\')) {
        value += this.advance();
      } else {
        value += char;
      }
    }

    if (this.isEOF()) {
      throw new LexerError('Unterminated string literal', start);
    }

    this.advance(); // Consume closing quote
    return this.createToken(TokenType.ATTR_VALUE, value, start);
  }

  /**
   * Capture a raw block body up to its matching close tag. Same-named
   * blocks inside the body nest; self-closing ones do not.
   */
  private scanRawBody(name: string, openStart: Position): Token {
    this.pendingRaw = null;
    const start = this.getPosition();
    let depth = 1;

    for (;;) {
      if (this.isEOF()) {
        throw new LexerError(`Unterminated ${name} block`, openStart);
      }

      if (this.match(this.endOpen) && this.tagNameAt(this.index + this.endOpen.length) === name) {
        depth--;
        if (depth === 0) {
          break;
        }
      } else if (
        this.match(this.open) &&
        this.tagNameAt(this.index + this.open.length) === name &&
        !this.isSelfClosingAt(this.index)
      ) {
        depth++;
      }

      this.advance();
    }

    return this.createToken(TokenType.RAW_TEXT, this.input.slice(start.index, this.index), start);
  }

  /**
   * Read the tag name starting at an index (after optional whitespace)
   * without consuming input
   */
  private tagNameAt(from: number): string {
    let i = from;
    while (i < this.input.length && this.isWhitespace(this.input[i])) {
      i++;
    }
    let name = '';
    while (i < this.input.length && (this.isNameChar(this.input[i]) || this.input[i] === '.')) {
      name += this.input[i];
      i++;
    }
    return name;
  }

  private isSelfClosingAt(from: number): boolean {
    const closeAt = this.input.indexOf(this.close, from + this.open.length);
    return closeAt > 0 && this.input[closeAt - 1] === '/';
  }

  private skipWhitespace(): void {
    while (!this.isEOF() && this.isWhitespace(this.peek())) {
      this.advance();
    }
  }

  /**
   * Create a token with the given type, value, and location
   */
  private createToken(type: TokenType, value: string, start: Position): Token {
    return {
      type,
      value,
      loc: {
        start,
        end: this.getPosition(),
      },
    };
  }

  private createEOFToken(): Token {
    const pos = this.getPosition();
    return {
      type: TokenType.EOF,
      value: '',
      loc: {
        start: pos,
        end: pos,
      },
    };
  }

  private consumeChars(count: number): string {
    let consumed = '';
    for (let i = 0; i < count; i++) {
      consumed += this.advance();
    }
    return consumed;
  }

  /**
   * Look ahead at next character without consuming it
   */
  private peek(): string {
    if (this.isEOF()) {
      return '';
    }
    return this.input[this.index];
  }

  /**
   * Consume and return next character, tracking line and column
   */
  private advance(): string {
    if (this.isEOF()) {
      return '';
    }

    const char = this.input[this.index];
    this.index++;

    if (char === '\n') {
      this.line++;
      this.column = 0;
    } else {
      this.column++;
    }

    return char;
  }

  /**
   * Check if next characters match the given string
   */
  private match(str: string): boolean {
    return this.input.startsWith(str, this.index);
  }

  private isEOF(): boolean {
    return this.index >= this.input.length;
  }

  private isNameStart(char: string): boolean {
    return (char >= 'a' && char <= 'z') || (char >= 'A' && char <= 'Z') || char === '_';
  }

  private isNameChar(char: string): boolean {
    return this.isNameStart(char) || (char >= '0' && char <= '9') || char === '-';
  }

  private isWhitespace(char: string): boolean {
    return char === ' ' || char === '\t' || char === '\n' || char === '\r';
  }

  private getPosition(): Position {
    return {
      line: this.line,
      column: this.column,
      index: this.index,
    };
  }
}
