/**
 * Immutable, insertion-ordered tag attributes
 *
 * @example
 * ```ts
 * const attrs = Attributes.from({ name: 'user', default: 'anon' });
 * attrs.getDefault('onerror', 'throw'); // => 'throw'
 * const next = attrs.with('prompty.content', 'body'); // attrs is unchanged
 * ```
 */
export class Attributes implements Iterable<[string, string]> {
  private readonly values: ReadonlyMap<string, string>;

  constructor(entries: Iterable<readonly [string, string]> = []) {
    this.values = new Map(entries);
  }

  static from(record: Readonly<Record<string, string>>): Attributes {
    return new Attributes(Object.entries(record));
  }

  get(name: string): string | undefined {
    return this.values.get(name);
  }

  getDefault(name: string, fallback: string): string {
    return this.values.get(name) ?? fallback;
  }

  has(name: string): boolean {
    return this.values.has(name);
  }

  keys(): string[] {
    return [...this.values.keys()];
  }

  entries(): Array<[string, string]> {
    return [...this.values.entries()];
  }

  get size(): number {
    return this.values.size;
  }

  /**
   * Copy with one attribute added or replaced
   */
  with(name: string, value: string): Attributes {
    const next = new Map(this.values);
    next.set(name, value);
    return new Attributes(next);
  }

  /**
   * Copy without the named attributes
   */
  without(...names: string[]): Attributes {
    const excluded = new Set(names);
    return new Attributes(this.entries().filter(([key]) => !excluded.has(key)));
  }

  toObject(): Record<string, string> {
    return Object.fromEntries(this.values);
  }

  [Symbol.iterator](): Iterator<[string, string]> {
    return this.values.entries();
  }
}
