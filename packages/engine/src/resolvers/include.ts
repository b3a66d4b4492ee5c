import { isPlainObject } from '@prompty/expressions';
import type { ExecutionContext } from '../context';
import type { Attributes } from '../parser/attributes';
import { CONTENT_ATTRIBUTE, type Resolver, type ResolverRuntime } from './types';

/** Key that holds a `with` value that is not an object */
export const VALUE_KEY = '_value';

const CONTROL_ATTRIBUTES = ['template', 'with', 'isolate', 'onerror', 'default', CONTENT_ATTRIBUTE];

/**
 * `{~prompty.include template="greeting" with="user" isolate="true" extra="x" /~}`
 *
 * - `with` selects a sub-path as the included template's root data
 * - `isolate="true"` hides the caller's data
 * - remaining attributes become string data in the included template
 */
export const includeResolver: Resolver = {
  tagName: 'prompty.include',

  validate(attributes: Attributes): void {
    if (!attributes.get('template')) {
      throw new Error("missing required 'template' attribute");
    }
    const isolate = attributes.get('isolate');
    if (isolate !== undefined && isolate !== 'true' && isolate !== 'false') {
      throw new Error(`'isolate' must be "true" or "false", got '${isolate}'`);
    }
  },

  async resolve(context: ExecutionContext, attributes: Attributes, runtime: ResolverRuntime): Promise<string> {
    const name = attributes.get('template') ?? '';
    if (!runtime.hasTemplate(name)) {
      throw new Error(`template '${name}' not found`);
    }

    return runtime.includeTemplate(name, buildChildContext(context, attributes));
  },
};

function buildChildContext(context: ExecutionContext, attributes: Attributes): ExecutionContext {
  const data: Record<string, unknown> = {};
  const withPath = attributes.get('with');

  // A missing `with` path leaves the root empty
  if (withPath !== undefined) {
    const selected = context.lookup(withPath);
    if (selected.found) {
      const value = selected.value;
      if (value instanceof Map) {
        Object.assign(data, Object.fromEntries(value));
      } else if (isPlainObject(value)) {
        Object.assign(data, value);
      } else {
        data[VALUE_KEY] = value;
      }
    }
  }

  for (const [key, value] of attributes.without(...CONTROL_ATTRIBUTES)) {
    data[key] = value;
  }

  const isolated = attributes.get('isolate') === 'true' || withPath !== undefined;
  return context.child(data, { inherit: !isolated });
}
