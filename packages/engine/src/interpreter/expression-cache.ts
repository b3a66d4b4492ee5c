import { parse, type Expression } from '@prompty/expressions';

const DEFAULT_CAPACITY = 1000;

/**
 * Parsed `eval` expressions keyed by source text
 *
 * Bounded; once full the oldest entry is evicted. Parse errors are not
 * cached.
 */
export class ExpressionCache {
  private readonly cache = new Map<string, Expression>();
  private readonly capacity: number;

  constructor(capacity: number = DEFAULT_CAPACITY) {
    this.capacity = capacity;
  }

  get(expression: string): Expression {
    let ast = this.cache.get(expression);
    if (!ast) {
      ast = parse(expression);
      if (this.cache.size >= this.capacity) {
        const oldest = this.cache.keys().next();
        if (!oldest.done) {
          this.cache.delete(oldest.value);
        }
      }
      this.cache.set(expression, ast);
    }
    return ast;
  }

  get size(): number {
    return this.cache.size;
  }

  clear(): void {
    this.cache.clear();
  }
}
