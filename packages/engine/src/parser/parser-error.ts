import { EngineError } from '../errors';
import type { Token } from '../lexer/token';

const CONTEXT_LENGTH = 50;

/**
 * Error thrown by the parser when encountering invalid syntax
 * Includes position information and a short token context for debugging
 */
export class ParserError extends EngineError {
  readonly context: string | null;

  constructor(message: string, token: Token | null, context?: string | null) {
    super(message, token?.loc.start ?? null);
    this.name = 'ParserError';
    this.context = context ?? null;
  }

  /**
   * Create a ParserError with automatic context extraction from token
   */
  static fromToken(message: string, token: Token | null, contextTokens?: Token[]): ParserError {
    let context: string | null = null;

    if (contextTokens && contextTokens.length > 0) {
      context = contextTokens
        .map((t) => t.value || `[${t.type}]`)
        .join(' ')
        .slice(0, CONTEXT_LENGTH);

      if (context.length === CONTEXT_LENGTH) {
        context += '...';
      }
    } else if (token && token.value !== '') {
      context = token.value.slice(0, CONTEXT_LENGTH);
      if (token.value.length > CONTEXT_LENGTH) {
        context += '...';
      }
    }

    return new ParserError(message, token, context);
  }
}
