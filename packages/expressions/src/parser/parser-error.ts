import { ExpressionSyntaxError } from '../errors';
import type { SourcePosition } from '../lexer/token';

/**
 * Thrown when a token stream does not form a valid expression
 */
export class ParserError extends ExpressionSyntaxError {
  constructor(message: string, expression: string, position: SourcePosition | null) {
    super(message, expression, position);
    this.name = 'ParserError';
  }
}
