import type { Logger } from '@prompty/logger';
import type { ExecutionContext } from '../context';
import type { Attributes } from '../parser/attributes';

/** Attribute holding the rendered children of a block tag */
export const CONTENT_ATTRIBUTE = 'prompty.content';

/** Tag names with this prefix belong to the engine */
export const RESERVED_PREFIX = 'prompty.';

/**
 * Where the tag being resolved sits in the source
 */
export interface TagInfo {
  name: string;
  line: number;
  column: number;
  selfClosing: boolean;
}

/**
 * Engine services available to a resolver during one call
 */
export interface ResolverRuntime {
  /** Aborted when execution is cancelled or times out */
  readonly signal: AbortSignal | undefined;
  readonly logger: Logger;
  readonly env: Readonly<Record<string, string | undefined>>;
  readonly tag: TagInfo;
  hasTemplate(name: string): boolean;
  /**
   * Render a registered template under the include depth and cycle checks
   */
  includeTemplate(name: string, context: ExecutionContext): Promise<string>;
}

/**
 * Handler for a custom tag
 *
 * @example
 * ```ts
 * const shout: Resolver = {
 *   tagName: 'shout',
 *   acceptsContent: true,
 *   validate(attributes) {},
 *   resolve: (_ctx, attributes) => (attributes.get('prompty.content') ?? '').toUpperCase(),
 * };
 * ```
 */
export interface Resolver {
  readonly tagName: string;
  /** Whether the resolver reads `prompty.content` from block tags */
  readonly acceptsContent?: boolean;
  /** Throw to reject the attributes */
  validate(attributes: Attributes): void;
  resolve(context: ExecutionContext, attributes: Attributes, runtime: ResolverRuntime): string | Promise<string>;
}
