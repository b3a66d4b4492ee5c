import { describe, expect, it } from 'vitest';
import { levenshteinDistance } from '../src/suggestions';
import { findSimilar } from '../src/index';

describe('levenshteinDistance', () => {
  it.each([
    ['kitten', 'sitting', 3],
    ['', 'abc', 3],
    ['same', 'same', 0],
    ['usr', 'user', 1],
  ])('%s -> %s is %i', (a, b, expected) => {
    expect(levenshteinDistance(a, b)).toBe(expected);
  });
});

describe('findSimilar', () => {
  it('returns close candidates, closest first', () => {
    expect(findSimilar('usr', ['count', 'users', 'user', 'use'])).toEqual(['user', 'use', 'users']);
  });

  it('ignores case', () => {
    expect(findSimilar('NAME', ['name', 'other'])).toEqual(['name']);
  });

  it('caps the number of suggestions', () => {
    expect(findSimilar('a', ['b', 'c', 'd', 'e'])).toEqual(['b', 'c', 'd']);
    expect(findSimilar('a', ['b', 'c'], 1)).toEqual(['b']);
  });

  it('returns nothing when no candidate is close', () => {
    expect(findSimilar('zzzzzz', ['alpha', 'beta'])).toEqual([]);
  });
});
