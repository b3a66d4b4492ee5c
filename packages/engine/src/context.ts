import { lookupProperty, stringify, type Scope } from '@prompty/expressions';

export const ERROR_STRATEGIES = ['throw', 'default', 'remove', 'keepraw', 'log'] as const;

/**
 * What happens when a tag fails to resolve
 */
export type ErrorStrategy = (typeof ERROR_STRATEGIES)[number];

export function isErrorStrategy(value: string): value is ErrorStrategy {
  return ERROR_STRATEGIES.some((strategy) => strategy === value);
}

export type LookupResult = { found: true; value: unknown } | { found: false };

export interface ChildOptions {
  /** Fall back to the parent for names not bound locally (default true) */
  inherit?: boolean;
}

const NOT_FOUND: LookupResult = { found: false };

/**
 * Hierarchical data scope a template executes against
 *
 * Lookups walk dotted paths through the local data first; an inheriting
 * child retries the full path on its parent when the local walk finds
 * nothing. Contexts are cheap and meant to be created per execution.
 */
export class ExecutionContext {
  private readonly data: Map<string, unknown>;
  private readonly parent: ExecutionContext | null;
  private readonly inherit: boolean;
  readonly errorStrategy: ErrorStrategy;

  constructor(
    data: Record<string, unknown> | Map<string, unknown> = {},
    errorStrategy: ErrorStrategy = 'throw',
    parent: ExecutionContext | null = null,
    inherit: boolean = true,
  ) {
    this.data = data instanceof Map ? new Map(data) : new Map(Object.entries(data));
    this.errorStrategy = errorStrategy;
    this.parent = parent;
    this.inherit = inherit;
  }

  /**
   * Resolve a dotted path (`user.profile.name`) or its parts
   */
  lookup(path: string | readonly string[]): LookupResult {
    const parts = typeof path === 'string' ? splitPath(path) : path;
    if (parts.length === 0) {
      return NOT_FOUND;
    }

    const local = this.lookupLocal(parts);
    if (local.found) {
      return local;
    }

    if (this.parent && this.inherit) {
      return this.parent.lookup(parts);
    }
    return NOT_FOUND;
  }

  get(path: string): unknown {
    const result = this.lookup(path);
    return result.found ? result.value : undefined;
  }

  has(path: string): boolean {
    return this.lookup(path).found;
  }

  getDefault(path: string, fallback: unknown): unknown {
    const result = this.lookup(path);
    return result.found ? result.value : fallback;
  }

  /**
   * Text form of the value; '' when absent
   */
  getString(path: string): string {
    return stringify(this.get(path));
  }

  getStringDefault(path: string, fallback: string): string {
    const result = this.lookup(path);
    return result.found ? stringify(result.value) : fallback;
  }

  /**
   * Adapter for expression evaluation, where absent reads as undefined
   */
  toScope(): Scope {
    return {
      lookup: (parts) => {
        const result = this.lookup(parts);
        return result.found ? result.value : undefined;
      },
    };
  }

  /**
   * Bind a top-level name in this context only
   */
  set(key: string, value: unknown): void {
    this.data.set(key, value);
  }

  /**
   * Visible top-level data, local bindings overriding inherited ones
   */
  snapshot(): Record<string, unknown> {
    const inherited = this.parent && this.inherit ? this.parent.snapshot() : {};
    return { ...inherited, ...Object.fromEntries(this.data) };
  }

  /**
   * Visible top-level names, sorted
   */
  keys(): string[] {
    const names = new Set(this.data.keys());
    if (this.parent && this.inherit) {
      for (const key of this.parent.keys()) {
        names.add(key);
      }
    }
    return [...names].sort();
  }

  child(data: Record<string, unknown> | Map<string, unknown> = {}, options: ChildOptions = {}): ExecutionContext {
    return new ExecutionContext(data, this.errorStrategy, this, options.inherit ?? true);
  }

  /**
   * A view over the same data with a different error strategy
   */
  withErrorStrategy(strategy: ErrorStrategy): ExecutionContext {
    if (strategy === this.errorStrategy) {
      return this;
    }
    return new ExecutionContext(new Map(), strategy, this, true);
  }

  private lookupLocal(parts: readonly string[]): LookupResult {
    const [head, ...rest] = parts;
    if (!this.data.has(head)) {
      return NOT_FOUND;
    }

    let current = this.data.get(head);
    for (const part of rest) {
      if (!hasProperty(current, part)) {
        return NOT_FOUND;
      }
      current = lookupProperty(current, part);
    }
    return { found: true, value: current };
  }
}

function splitPath(path: string): string[] {
  return path.split('.').filter((part) => part !== '');
}

/**
 * Nested properties bound to undefined count as missing
 */
function hasProperty(value: unknown, name: string): boolean {
  return lookupProperty(value, name) !== undefined;
}
