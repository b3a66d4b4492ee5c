import { ExpressionSyntaxError } from '../errors';
import type { SourcePosition } from './token';

/**
 * Thrown when an expression cannot be tokenized
 */
export class LexerError extends ExpressionSyntaxError {
  constructor(message: string, expression: string, position: SourcePosition) {
    super(message, expression, position);
    this.name = 'LexerError';
  }
}
