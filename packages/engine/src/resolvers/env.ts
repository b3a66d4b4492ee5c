import type { ExecutionContext } from '../context';
import type { Attributes } from '../parser/attributes';
import type { Resolver, ResolverRuntime } from './types';

/**
 * `{~prompty.env name="API_URL" default="http://localhost" required="true" /~}`
 *
 * Reads the engine's environment map; an unset or empty variable renders
 * the default, fails when required, or renders nothing.
 */
export const envResolver: Resolver = {
  tagName: 'prompty.env',

  validate(attributes: Attributes): void {
    if (!attributes.get('name')) {
      throw new Error("missing required 'name' attribute");
    }
    const required = attributes.get('required');
    if (required !== undefined && required !== 'true' && required !== 'false') {
      throw new Error(`'required' must be "true" or "false", got '${required}'`);
    }
  },

  resolve(_context: ExecutionContext, attributes: Attributes, runtime: ResolverRuntime): string {
    const name = attributes.get('name') ?? '';
    const value = runtime.env[name];
    if (value !== undefined && value !== '') {
      return value;
    }

    const fallback = attributes.get('default');
    if (fallback !== undefined) {
      return fallback;
    }
    if (attributes.get('required') === 'true') {
      throw new Error(`required environment variable '${name}' is not set`);
    }
    return '';
  },
};
