import { LexerError } from './lexer-error';
import type { SourcePosition, Token } from './token';
import { TokenType } from './token-types';

/**
 * Words that would suggest general-purpose code. They are rejected outright so
 * the error names the construct instead of failing later as an unknown path.
 */
const FORBIDDEN_WORDS: Record<string, string> = {
  function: 'Function definitions are not allowed',
  this: "The 'this' keyword is not allowed",
  new: "The 'new' keyword is not allowed",
  for: 'Loops are not allowed',
  while: 'Loops are not allowed',
  var: 'Variable declarations are not allowed',
  let: 'Variable declarations are not allowed',
  const: 'Variable declarations are not allowed',
  class: 'Class definitions are not allowed',
  import: 'Import/export is not allowed',
  export: 'Import/export is not allowed',
  delete: "The 'delete' keyword is not allowed",
  typeof: "The 'typeof' keyword is not allowed; use typeOf()",
  instanceof: "The 'instanceof' keyword is not allowed",
  await: 'Async/await is not allowed',
};

/**
 * Lexer for the expression language used by `eval` attributes
 */
export class Lexer {
  private input: string = '';
  private position: number = 0;
  private line: number = 1;
  private column: number = 0;

  /**
   * Tokenize an expression string
   */
  tokenize(input: string): Token[] {
    this.input = input;
    this.position = 0;
    this.line = 1;
    this.column = 0;

    const tokens: Token[] = [];

    while (!this.isAtEnd()) {
      this.skipWhitespace();
      if (this.isAtEnd()) break;

      tokens.push(this.nextToken());
    }

    tokens.push(this.makeToken(TokenType.EOF, ''));
    return tokens;
  }

  private isAtEnd(): boolean {
    return this.position >= this.input.length;
  }

  private peek(): string {
    if (this.isAtEnd()) return '\0';
    return this.input[this.position];
  }

  private peekNext(): string {
    if (this.position + 1 >= this.input.length) return '\0';
    return this.input[this.position + 1];
  }

  private advance(): string {
    const char = this.input[this.position];
    this.position++;
    if (char === '\n') {
      this.line++;
      this.column = 0;
    } else {
      this.column++;
    }
    return char;
  }

  private currentPosition(): SourcePosition {
    return {
      line: this.line,
      column: this.column,
      offset: this.position,
    };
  }

  private makeToken(type: TokenType, value: string, startPos?: SourcePosition): Token {
    const start = startPos ?? this.currentPosition();
    const end = this.currentPosition();
    return {
      type,
      value,
      loc: { start, end },
    };
  }

  private error(message: string, position: SourcePosition = this.currentPosition()): never {
    throw new LexerError(message, this.input, position);
  }

  private skipWhitespace(): void {
    while (!this.isAtEnd()) {
      const char = this.peek();
      if (char === ' ' || char === '\t' || char === '\n' || char === '\r') {
        this.advance();
      } else {
        break;
      }
    }
  }

  private nextToken(): Token {
    const start = this.currentPosition();
    const char = this.peek();

    if (char === '"' || char === "'") {
      return this.string(char, start);
    }

    if (this.isDigit(char) || (char === '.' && this.isDigit(this.peekNext()))) {
      return this.number(start);
    }

    if (this.isAlpha(char)) {
      return this.identifier(start);
    }

    return this.operator(start);
  }

  private isDigit(char: string): boolean {
    return char >= '0' && char <= '9';
  }

  private isAlpha(char: string): boolean {
    return (char >= 'a' && char <= 'z') || (char >= 'A' && char <= 'Z') || char === '_';
  }

  private isAlphaNumeric(char: string): boolean {
    return this.isAlpha(char) || this.isDigit(char);
  }

  private string(quote: string, start: SourcePosition): Token {
    this.advance(); // opening quote
    let value = '';

    while (!this.isAtEnd() && this.peek() !== quote) {
      if (this.peek() === '\\') {
        this.advance();
        if (this.isAtEnd()) {
          this.error('Unterminated string literal', start);
        }
        const escaped = this.advance();
        switch (escaped) {
          case 'n':
            value += '\n';
            break;
          case 't':
            value += '\t';
            break;
          case 'r':
            value += '\r';
            break;
          default:
            // \\, \' and \" as well as unknown escapes keep the character
            value += escaped;
        }
      } else {
        value += this.advance();
      }
    }

    if (this.isAtEnd()) {
      this.error('Unterminated string literal', start);
    }

    this.advance(); // closing quote
    return this.makeToken(TokenType.STRING, value, start);
  }

  private number(start: SourcePosition): Token {
    let value = '';

    while (!this.isAtEnd() && this.isDigit(this.peek())) {
      value += this.advance();
    }

    if (this.peek() === '.' && this.isDigit(this.peekNext())) {
      value += this.advance();
      while (!this.isAtEnd() && this.isDigit(this.peek())) {
        value += this.advance();
      }
    }

    if (this.isAlpha(this.peek())) {
      this.error(`Invalid number '${value}${this.peek()}'`, start);
    }

    return this.makeToken(TokenType.NUMBER, value, start);
  }

  private identifier(start: SourcePosition): Token {
    let value = '';

    while (!this.isAtEnd() && this.isAlphaNumeric(this.peek())) {
      value += this.advance();
    }

    switch (value) {
      case 'true':
      case 'false':
        return this.makeToken(TokenType.BOOLEAN, value, start);
      case 'null':
      case 'nil':
        return this.makeToken(TokenType.NULL, value, start);
    }

    const forbidden = FORBIDDEN_WORDS[value];
    if (forbidden !== undefined && Object.prototype.hasOwnProperty.call(FORBIDDEN_WORDS, value)) {
      this.error(forbidden, start);
    }

    return this.makeToken(TokenType.IDENTIFIER, value, start);
  }

  private operator(start: SourcePosition): Token {
    const char = this.advance();

    switch (char) {
      case '(':
        return this.makeToken(TokenType.LPAREN, char, start);
      case ')':
        return this.makeToken(TokenType.RPAREN, char, start);
      case ',':
        return this.makeToken(TokenType.COMMA, char, start);
      case '.':
        return this.makeToken(TokenType.DOT, char, start);
      case '-':
        if (this.peek() === '-') {
          this.error('Decrement operator (--) is not allowed', start);
        }
        return this.makeToken(TokenType.MINUS, char, start);

      case '>':
        if (this.peek() === '=') {
          this.advance();
          return this.makeToken(TokenType.GTE, '>=', start);
        }
        return this.makeToken(TokenType.GT, char, start);

      case '<':
        if (this.peek() === '=') {
          this.advance();
          return this.makeToken(TokenType.LTE, '<=', start);
        }
        return this.makeToken(TokenType.LT, char, start);

      case '=':
        if (this.peek() === '=') {
          this.advance();
          return this.makeToken(TokenType.EQ, '==', start);
        }
        this.error('Assignment is not allowed', start);

      case '!':
        if (this.peek() === '=') {
          this.advance();
          return this.makeToken(TokenType.NEQ, '!=', start);
        }
        return this.makeToken(TokenType.NOT, char, start);

      case '&':
        if (this.peek() === '&') {
          this.advance();
          return this.makeToken(TokenType.AND, '&&', start);
        }
        this.error("Invalid operator '&'. Use '&&' for logical AND", start);

      case '|':
        if (this.peek() === '|') {
          this.advance();
          return this.makeToken(TokenType.OR, '||', start);
        }
        this.error("Invalid operator '|'. Use '||' for logical OR", start);

      case '+':
      case '*':
      case '/':
      case '%':
        this.error(`Arithmetic operator '${char}' is not allowed`, start);

      case '[':
      case ']':
        this.error('Bracket access is not allowed; use dotted paths', start);

      case '?':
        this.error('Ternary expressions are not allowed', start);

      default:
        this.error(`Unexpected character '${char}'`, start);
    }
  }
}
