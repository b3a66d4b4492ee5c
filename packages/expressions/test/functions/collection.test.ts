import { describe, expect, it } from 'vitest';
import { first, has, keys, last, len, values } from '../../src/functions/collection';

describe('Collection Functions', () => {
  describe('len', () => {
    it('measures strings, arrays, maps and objects', () => {
      expect(len('abc')).toBe(3);
      expect(len([1, 2])).toBe(2);
      expect(len(new Map([['a', 1]]))).toBe(1);
      expect(len({ a: 1, b: 2 })).toBe(2);
    });

    it('returns 0 for nil', () => {
      expect(len(null)).toBe(0);
    });

    it('throws for numbers', () => {
      expect(() => len(5)).toThrow('len() requires a string, array or object');
    });
  });

  describe('first / last', () => {
    it('returns the ends of an array', () => {
      expect(first([1, 2, 3])).toBe(1);
      expect(last([1, 2, 3])).toBe(3);
    });

    it('returns null for empty arrays', () => {
      expect(first([])).toBeNull();
      expect(last(null)).toBeNull();
    });

    it('throws for non-arrays', () => {
      expect(() => first('abc')).toThrow('first() requires an array');
    });
  });

  describe('keys / values', () => {
    it('sorts keys', () => {
      expect(keys({ b: 1, a: 2, c: 3 })).toEqual(['a', 'b', 'c']);
    });

    it('orders values by key', () => {
      expect(values({ b: 1, a: 2 })).toEqual([2, 1]);
      expect(values(new Map([['z', 'last'], ['m', 'mid']]))).toEqual(['mid', 'last']);
    });

    it('throws for arrays', () => {
      expect(() => keys([1])).toThrow('keys() requires an object');
    });
  });

  describe('has', () => {
    it('checks own keys', () => {
      expect(has({ a: undefined }, 'a')).toBe(true);
      expect(has({}, 'toString')).toBe(false);
      expect(has(new Map([['k', 1]]), 'k')).toBe(true);
    });

    it('requires a string key', () => {
      expect(() => has({}, 1)).toThrow('has() requires a string key');
    });
  });
});
