import { EngineError } from '../errors';
import type { Position } from './token';

/**
 * Error thrown by the lexer when encountering invalid syntax
 */
export class LexerError extends EngineError {
  constructor(message: string, position: Position) {
    super(message, position);
    this.name = 'LexerError';
  }
}
