/**
 * String functions for expressions
 *
 * Nil arguments read as the empty string. Any other non-string argument is a
 * type error.
 */

import { isNil } from '../runtime/utils';
import type { ExpressionFunction } from './registry';

function requireString(value: unknown, fnName: string, position: number): string {
  if (isNil(value)) {
    return '';
  }
  if (typeof value !== 'string') {
    throw new TypeError(`${fnName}() requires a string as argument ${position}`);
  }
  return value;
}

export function upper(str: unknown): string {
  return requireString(str, 'upper', 1).toUpperCase();
}

export function lower(str: unknown): string {
  return requireString(str, 'lower', 1).toLowerCase();
}

/**
 * Trim whitespace from both ends
 */
export function trim(str: unknown): string {
  return requireString(str, 'trim', 1).trim();
}

export function trimPrefix(str: unknown, prefix: unknown): string {
  const s = requireString(str, 'trimPrefix', 1);
  const p = requireString(prefix, 'trimPrefix', 2);
  return p !== '' && s.startsWith(p) ? s.slice(p.length) : s;
}

export function trimSuffix(str: unknown, suffix: unknown): string {
  const s = requireString(str, 'trimSuffix', 1);
  const p = requireString(suffix, 'trimSuffix', 2);
  return p !== '' && s.endsWith(p) ? s.slice(0, s.length - p.length) : s;
}

export function hasPrefix(str: unknown, prefix: unknown): boolean {
  return requireString(str, 'hasPrefix', 1).startsWith(requireString(prefix, 'hasPrefix', 2));
}

export function hasSuffix(str: unknown, suffix: unknown): boolean {
  return requireString(str, 'hasSuffix', 1).endsWith(requireString(suffix, 'hasSuffix', 2));
}

/**
 * Substring test for strings, membership test for arrays
 */
export function contains(haystack: unknown, needle: unknown): boolean {
  if (Array.isArray(haystack)) {
    return haystack.includes(needle);
  }
  return requireString(haystack, 'contains', 1).includes(requireString(needle, 'contains', 2));
}

/**
 * Replace every occurrence of `search`
 */
export function replace(str: unknown, search: unknown, replacement: unknown): string {
  const s = requireString(str, 'replace', 1);
  const from = requireString(search, 'replace', 2);
  const to = requireString(replacement, 'replace', 3);
  if (from === '') {
    return s;
  }
  return s.split(from).join(to);
}

export function split(str: unknown, delimiter: unknown): string[] {
  return requireString(str, 'split', 1).split(requireString(delimiter, 'split', 2));
}

/**
 * Join array elements; nil and non-string elements become ''
 */
export function join(arr: unknown, delimiter: unknown): string {
  if (isNil(arr)) {
    return '';
  }
  if (!Array.isArray(arr)) {
    throw new TypeError('join() requires an array as argument 1');
  }
  const separator = requireString(delimiter, 'join', 2);
  return arr.map((item) => (typeof item === 'string' ? item : '')).join(separator);
}

export const stringFunctions: ExpressionFunction[] = [
  { name: 'upper', minArgs: 1, maxArgs: 1, fn: ([s]) => upper(s) },
  { name: 'lower', minArgs: 1, maxArgs: 1, fn: ([s]) => lower(s) },
  { name: 'trim', minArgs: 1, maxArgs: 1, fn: ([s]) => trim(s) },
  { name: 'trimPrefix', minArgs: 2, maxArgs: 2, fn: ([s, p]) => trimPrefix(s, p) },
  { name: 'trimSuffix', minArgs: 2, maxArgs: 2, fn: ([s, p]) => trimSuffix(s, p) },
  { name: 'hasPrefix', minArgs: 2, maxArgs: 2, fn: ([s, p]) => hasPrefix(s, p) },
  { name: 'hasSuffix', minArgs: 2, maxArgs: 2, fn: ([s, p]) => hasSuffix(s, p) },
  { name: 'contains', minArgs: 2, maxArgs: 2, fn: ([h, n]) => contains(h, n) },
  { name: 'replace', minArgs: 3, maxArgs: 3, fn: ([s, a, b]) => replace(s, a, b) },
  { name: 'split', minArgs: 2, maxArgs: 2, fn: ([s, d]) => split(s, d) },
  { name: 'join', minArgs: 2, maxArgs: 2, fn: ([a, d]) => join(a, d) },
];
