import { RegistrationError, type RegistrationKind } from '../errors';
import { RESERVED_PREFIX } from '../resolvers/types';

/**
 * Name-keyed store where the first registration wins
 *
 * Entries added through `registerBuiltin` may use the reserved prefix and
 * cannot be removed. Listing returns sorted copies.
 */
export abstract class Registry<T> {
  protected readonly entries = new Map<string, T>();
  private readonly builtins = new Set<string>();

  protected abstract readonly kind: RegistrationKind;

  protected add(name: string, entry: T): void {
    this.assertName(name);
    if (name.startsWith(RESERVED_PREFIX)) {
      throw new RegistrationError(
        this.kind,
        name,
        `Cannot register ${this.kind} '${name}': the '${RESERVED_PREFIX}' prefix is reserved`,
      );
    }
    this.insert(name, entry);
  }

  /** @internal used by the engine to install built-ins */
  registerBuiltin(name: string, entry: T): void {
    this.assertName(name);
    this.insert(name, entry);
    this.builtins.add(name);
  }

  /**
   * @returns false when nothing is registered under the name
   * @throws {RegistrationError} For built-ins
   */
  unregister(name: string): boolean {
    if (this.builtins.has(name)) {
      throw new RegistrationError(this.kind, name, `Cannot unregister built-in ${this.kind} '${name}'`);
    }
    return this.entries.delete(name);
  }

  has(name: string): boolean {
    return this.entries.has(name);
  }

  get(name: string): T | undefined {
    return this.entries.get(name);
  }

  isBuiltin(name: string): boolean {
    return this.builtins.has(name);
  }

  list(): string[] {
    return [...this.entries.keys()].sort();
  }

  count(): number {
    return this.entries.size;
  }

  private assertName(name: string): void {
    if (name.trim() === '') {
      throw new RegistrationError(this.kind, name, `${capitalize(this.kind)} name must not be empty`);
    }
  }

  private insert(name: string, entry: T): void {
    if (this.entries.has(name)) {
      throw new RegistrationError(this.kind, name, `${capitalize(this.kind)} '${name}' is already registered`);
    }
    this.entries.set(name, entry);
  }
}

function capitalize(text: string): string {
  return text.charAt(0).toUpperCase() + text.slice(1);
}
