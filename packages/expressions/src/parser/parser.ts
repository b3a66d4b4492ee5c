import { Lexer } from '../lexer/lexer';
import type { SourceLocation, Token } from '../lexer/token';
import { TokenType } from '../lexer/token-types';
import type {
  BinaryExpression,
  CallExpression,
  Expression,
  Literal,
  LogicalExpression,
  Path,
  UnaryExpression,
} from './ast';
import { ParserError } from './parser-error';

type ComparisonOperator = BinaryExpression['operator'];

const BINARY_OPERATORS: Partial<Record<TokenType, ComparisonOperator>> = {
  [TokenType.EQ]: '==',
  [TokenType.NEQ]: '!=',
  [TokenType.GT]: '>',
  [TokenType.GTE]: '>=',
  [TokenType.LT]: '<',
  [TokenType.LTE]: '<=',
};

/**
 * Recursive descent parser for `eval` expressions
 *
 * Operator precedence (lowest to highest):
 * 1. Logical OR (||)
 * 2. Logical AND (&&)
 * 3. Equality (==, !=)
 * 4. Comparison (>, >=, <, <=)
 * 5. Unary (!, - on number literals)
 * 6. Paths and calls
 * 7. Primary (literals, grouping)
 */
export class Parser {
  private tokens: Token[] = [];
  private current: number = 0;
  private input: string = '';

  /**
   * Parse an expression string into an AST
   */
  parse(input: string): Expression {
    this.input = input;
    const lexer = new Lexer();
    this.tokens = lexer.tokenize(input);
    this.current = 0;

    if (this.isAtEnd()) {
      throw this.error('Empty expression');
    }

    const expr = this.expression();

    if (!this.isAtEnd()) {
      throw this.error(`Unexpected token '${this.peek().value}'`);
    }

    return expr;
  }

  // Token navigation

  private peek(): Token {
    return this.tokens[this.current];
  }

  private previous(): Token {
    return this.tokens[this.current - 1];
  }

  private isAtEnd(): boolean {
    return this.peek().type === TokenType.EOF;
  }

  private advance(): Token {
    if (!this.isAtEnd()) {
      this.current++;
    }
    return this.previous();
  }

  private check(type: TokenType): boolean {
    if (this.isAtEnd()) return false;
    return this.peek().type === type;
  }

  private match(...types: TokenType[]): boolean {
    for (const type of types) {
      if (this.check(type)) {
        this.advance();
        return true;
      }
    }
    return false;
  }

  private consume(type: TokenType, message: string): Token {
    if (this.check(type)) return this.advance();
    throw this.error(message);
  }

  private error(message: string): ParserError {
    const token = this.peek();
    return new ParserError(message, this.input, token.loc.start);
  }

  private makeLoc(start: Token, end: Token): SourceLocation {
    return {
      start: start.loc.start,
      end: end.loc.end,
    };
  }

  // Expression parsing - precedence climbing

  private expression(): Expression {
    return this.logicalOr();
  }

  private logicalOr(): Expression {
    const startToken = this.peek();
    let left = this.logicalAnd();

    while (this.match(TokenType.OR)) {
      const right = this.logicalAnd();
      const node: LogicalExpression = {
        type: 'LogicalExpression',
        operator: '||',
        left,
        right,
        loc: this.makeLoc(startToken, this.previous()),
      };
      left = node;
    }

    return left;
  }

  private logicalAnd(): Expression {
    const startToken = this.peek();
    let left = this.equality();

    while (this.match(TokenType.AND)) {
      const right = this.equality();
      const node: LogicalExpression = {
        type: 'LogicalExpression',
        operator: '&&',
        left,
        right,
        loc: this.makeLoc(startToken, this.previous()),
      };
      left = node;
    }

    return left;
  }

  private equality(): Expression {
    return this.binary([TokenType.EQ, TokenType.NEQ], () => this.comparison());
  }

  private comparison(): Expression {
    return this.binary([TokenType.GT, TokenType.GTE, TokenType.LT, TokenType.LTE], () =>
      this.unary(),
    );
  }

  private binary(types: TokenType[], operand: () => Expression): Expression {
    const startToken = this.peek();
    let left = operand();

    while (this.match(...types)) {
      const operator = BINARY_OPERATORS[this.previous().type];
      if (operator === undefined) {
        throw this.error(`Unknown operator '${this.previous().value}'`);
      }
      const right = operand();
      const node: BinaryExpression = {
        type: 'BinaryExpression',
        operator,
        left,
        right,
        loc: this.makeLoc(startToken, this.previous()),
      };
      left = node;
    }

    return left;
  }

  private unary(): Expression {
    const startToken = this.peek();

    if (this.match(TokenType.NOT)) {
      const argument = this.unary();
      const node: UnaryExpression = {
        type: 'UnaryExpression',
        operator: '!',
        argument,
        loc: this.makeLoc(startToken, this.previous()),
      };
      return node;
    }

    if (this.match(TokenType.MINUS)) {
      // Only negative number literals; there is no arithmetic
      const number = this.consume(TokenType.NUMBER, 'Unary minus is only allowed before a number');
      const node: Literal = {
        type: 'Literal',
        value: -parseFloat(number.value),
        loc: this.makeLoc(startToken, number),
      };
      return node;
    }

    return this.pathOrCall();
  }

  private pathOrCall(): Expression {
    if (!this.check(TokenType.IDENTIFIER)) {
      return this.primary();
    }

    const startToken = this.advance();
    const parts = [startToken.value];

    while (this.match(TokenType.DOT)) {
      const name = this.consume(TokenType.IDENTIFIER, 'Expected property name after "."');
      parts.push(name.value);
    }

    if (this.check(TokenType.LPAREN)) {
      if (parts.length > 1) {
        throw new ParserError(
          'Method calls are not allowed; use built-in functions',
          this.input,
          startToken.loc.start,
        );
      }
      return this.call(startToken);
    }

    const node: Path = {
      type: 'Path',
      parts,
      original: parts.join('.'),
      loc: this.makeLoc(startToken, this.previous()),
    };
    return node;
  }

  private call(nameToken: Token): CallExpression {
    this.consume(TokenType.LPAREN, 'Expected "(" after function name');
    const args: Expression[] = [];

    if (!this.check(TokenType.RPAREN)) {
      do {
        args.push(this.expression());
      } while (this.match(TokenType.COMMA));
    }

    const endToken = this.consume(TokenType.RPAREN, 'Expected ")" after arguments');

    if (this.check(TokenType.DOT) || this.check(TokenType.LPAREN)) {
      throw this.error('Call results cannot be accessed or called');
    }

    return {
      type: 'CallExpression',
      callee: nameToken.value,
      arguments: args,
      loc: this.makeLoc(nameToken, endToken),
    };
  }

  private primary(): Expression {
    const token = this.peek();

    if (this.match(TokenType.STRING)) {
      const node: Literal = { type: 'Literal', value: token.value, loc: token.loc };
      return node;
    }

    if (this.match(TokenType.NUMBER)) {
      const node: Literal = { type: 'Literal', value: parseFloat(token.value), loc: token.loc };
      return node;
    }

    if (this.match(TokenType.BOOLEAN)) {
      const node: Literal = { type: 'Literal', value: token.value === 'true', loc: token.loc };
      return node;
    }

    if (this.match(TokenType.NULL)) {
      const node: Literal = { type: 'Literal', value: null, loc: token.loc };
      return node;
    }

    // Grouping
    if (this.match(TokenType.LPAREN)) {
      const expr = this.expression();
      this.consume(TokenType.RPAREN, 'Expected ")" after expression');
      if (this.check(TokenType.DOT)) {
        throw this.error('Property access on a grouped expression is not allowed');
      }
      return expr;
    }

    if (this.isAtEnd()) {
      throw this.error('Unexpected end of expression');
    }

    throw this.error(`Unexpected token '${token.value}'`);
  }
}
