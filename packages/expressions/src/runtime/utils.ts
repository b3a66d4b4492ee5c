/**
 * Runtime utilities for safe property access and value inspection
 *
 * Security-critical: expressions may only read data, never walk into
 * prototypes.
 */

const hasOwnProperty = Object.prototype.hasOwnProperty;

/**
 * Properties that could lead to prototype pollution or code execution
 */
const DANGEROUS_PROPERTIES = new Set([
  '__proto__',
  'constructor',
  'prototype',
  '__defineGetter__',
  '__defineSetter__',
  '__lookupGetter__',
  '__lookupSetter__',
]);

/**
 * Security-aware property lookup.
 *
 * Only own properties are returned, never inherited ones. Maps are read with
 * `get`, and `length` is allowed on arrays and strings.
 *
 * @returns The property value, or undefined when it is absent or blocked
 */
export function lookupProperty(parent: unknown, propertyName: string): unknown {
  if (parent == null) {
    return undefined;
  }

  if (DANGEROUS_PROPERTIES.has(propertyName)) {
    return undefined;
  }

  if (parent instanceof Map) {
    return parent.get(propertyName);
  }

  if (typeof parent === 'string') {
    return propertyName === 'length' ? parent.length : undefined;
  }

  if (typeof parent !== 'object') {
    return undefined;
  }

  if (Array.isArray(parent) && propertyName === 'length') {
    return parent.length;
  }

  if (hasOwnProperty.call(parent, propertyName)) {
    return Object.getOwnPropertyDescriptor(parent, propertyName)?.value;
  }

  return undefined;
}

/**
 * Resolve a path by walking through parts sequentially.
 *
 * Returns undefined as soon as an intermediate value is null or undefined.
 */
export function resolvePath(object: unknown, parts: readonly string[]): unknown {
  let current = object;

  for (const part of parts) {
    if (current == null) {
      return undefined;
    }
    current = lookupProperty(current, part);
  }

  return current;
}

/**
 * Check if a value is a plain object: an object literal or a null-prototype
 * object. Arrays, Maps, dates and class instances are not.
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  const prototype: unknown = Object.getPrototypeOf(value);
  return prototype === Object.prototype || prototype === null;
}

/**
 * Null and undefined both mean "no value"
 */
export function isNil(value: unknown): value is null | undefined {
  return value === null || value === undefined;
}

/**
 * Number of entries in a string, array, Map or plain object; null otherwise
 */
export function sizeOf(value: unknown): number | null {
  if (typeof value === 'string' || Array.isArray(value)) {
    return value.length;
  }
  if (value instanceof Map) {
    return value.size;
  }
  if (isPlainObject(value)) {
    return Object.keys(value).length;
  }
  return null;
}

/**
 * True for nil and for zero-length strings and collections
 */
export function isEmpty(value: unknown): boolean {
  if (isNil(value)) {
    return true;
  }
  return sizeOf(value) === 0;
}

/**
 * Truthiness used by conditions:
 * - booleans are themselves
 * - strings and collections are truthy when non-empty
 * - numbers are truthy when non-zero
 * - nil is falsy, anything else is truthy
 */
export function isTruthy(value: unknown): boolean {
  if (isNil(value)) {
    return false;
  }
  if (typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'number') {
    return value !== 0 && !Number.isNaN(value);
  }
  const size = sizeOf(value);
  if (size !== null) {
    return size > 0;
  }
  return true;
}

/**
 * Text form of a value: strings as is, nil as '', numbers and booleans
 * in their usual form, dates as ISO 8601 and collections as JSON.
 */
export function stringify(value: unknown): string {
  if (isNil(value)) {
    return '';
  }
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number' || typeof value === 'boolean' || typeof value === 'bigint') {
    return String(value);
  }
  if (value instanceof Date && !Number.isNaN(value.getTime())) {
    return value.toISOString();
  }
  if (value instanceof Map) {
    return JSON.stringify(Object.fromEntries(value));
  }
  if (Array.isArray(value) || isPlainObject(value)) {
    return JSON.stringify(value);
  }
  return String(value);
}

/**
 * Entries of a plain object or Map ordered by key
 */
export function sortedEntries(
  value: Map<unknown, unknown> | Record<string, unknown>,
): Array<[string, unknown]> {
  const entries: Array<[string, unknown]> =
    value instanceof Map
      ? [...value.entries()].map(([key, item]): [string, unknown] => [String(key), item])
      : Object.entries(value);
  return entries.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
}
