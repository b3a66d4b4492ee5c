import { stringify } from '@prompty/expressions';
import type { ExecutionContext } from '../context';
import type { Attributes } from '../parser/attributes';
import { findSimilar } from '../suggestions';
import type { Resolver } from './types';

const HINT = 'Hint: use default="value" to provide a fallback, or onerror to choose how failures render';
const MAX_LISTED_KEYS = 10;

/**
 * `{~prompty.var name="user.name" default="anon" /~}`
 */
export const varResolver: Resolver = {
  tagName: 'prompty.var',

  validate(attributes: Attributes): void {
    if (!attributes.get('name')) {
      throw new Error("missing required 'name' attribute");
    }
  },

  resolve(context: ExecutionContext, attributes: Attributes): string {
    const name = attributes.get('name') ?? '';
    const result = context.lookup(name);
    if (result.found) {
      return stringify(result.value);
    }

    // With onerror set the default belongs to the error strategy
    const fallback = attributes.get('default');
    if (fallback !== undefined && !attributes.has('onerror')) {
      return fallback;
    }

    throw new Error(variableNotFoundMessage(name, context.keys(), !attributes.has('onerror')));
  },
};

export function variableNotFoundMessage(name: string, keys: readonly string[], withHint: boolean): string {
  let message = `variable '${name}' not found`;

  const suggestions = findSimilar(name.split('.')[0], keys);
  if (suggestions.length > 0) {
    message += ` (did you mean: ${suggestions.join(', ')}?)`;
  } else if (keys.length > 0) {
    const listed = keys.slice(0, MAX_LISTED_KEYS).join(', ');
    message += ` (available: ${listed}${keys.length > MAX_LISTED_KEYS ? ', ...' : ''})`;
  }

  return withHint ? `${message}\n${HINT}` : message;
}
