import type { RegistrationKind } from '../errors';
import type { Resolver } from '../resolvers/types';
import { Registry } from './registry';

/**
 * Resolvers keyed by tag name
 */
export class ResolverRegistry extends Registry<Resolver> {
  protected readonly kind: RegistrationKind = 'resolver';

  register(resolver: Resolver): void {
    this.add(resolver.tagName, resolver);
  }
}
