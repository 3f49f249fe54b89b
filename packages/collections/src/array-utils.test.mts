import { describe, it, expect } from 'vitest';
import {
  join,
  joinAll,
  mapSequence,
  forEachItem,
  updateEach,
  anyTruthy,
  allTruthy,
  contains,
  containsBy,
} from './array-utils.mjs';

describe('array-utils', () => {
  describe('join', () => {
    it('should put the first array before the second', () => {
      expect(join([1, 2], [3, 4, 5])).toEqual([1, 2, 3, 4, 5]);
    });

    it('should keep length and both halves intact', () => {
      const a = ['x', 'y'];
      const b = ['z'];
      const joined = join(a, b);

      expect(joined).toHaveLength(a.length + b.length);
      expect(joined.slice(0, a.length)).toEqual(a);
      expect(joined.slice(a.length)).toEqual(b);
    });

    it('should handle empty arrays on either side', () => {
      expect(join([], [1])).toEqual([1]);
      expect(join([1], [])).toEqual([1]);
      expect(join([], [])).toEqual([]);
    });

    it('should return a new array and leave inputs untouched', () => {
      const a = [1];
      const b = [2];
      const joined = join(a, b);

      joined.push(3);
      expect(a).toEqual([1]);
      expect(b).toEqual([2]);
      expect(joined).not.toBe(a);
    });

    it('should keep duplicates', () => {
      expect(join([1, 1], [1])).toEqual([1, 1, 1]);
    });
  });

  describe('joinAll', () => {
    it('should return an empty array for no inputs', () => {
      expect(joinAll([])).toEqual([]);
    });

    it('should return a copy for a single input', () => {
      const only = [4, 5];
      const joined = joinAll([only]);
      expect(joined).toEqual(only);
      expect(joined).not.toBe(only);
    });

    it('should agree with join for two inputs', () => {
      const a = ['a', 'b'];
      const b = ['c'];
      expect(joinAll([a, b])).toEqual(join(a, b));
    });

    it('should concatenate in list order, skipping empties', () => {
      expect(joinAll([[3], [], [1, 2], [0]])).toEqual([3, 1, 2, 0]);
    });
  });

  describe('mapSequence', () => {
    it('should apply the function to each element', () => {
      expect(mapSequence((n: number) => n * 10)([1, 2, 3])).toEqual([10, 20, 30]);
    });

    it('should keep index correspondence', () => {
      const input = ['a', 'bb', 'ccc'];
      const fn = (s: string) => s.length;
      const output = mapSequence(fn)(input);

      expect(output).toHaveLength(input.length);
      input.forEach((item, i) => {
        expect(output[i]).toBe(fn(item));
      });
    });

    it('should pass the index as the second argument', () => {
      const labelled = mapSequence((item: string, i: number) => `${i}:${item}`)(['a', 'b']);
      expect(labelled).toEqual(['0:a', '1:b']);
    });

    it('should handle empty arrays', () => {
      expect(mapSequence((n: number) => n + 1)([])).toEqual([]);
    });
  });

  describe('forEachItem', () => {
    it('should visit every element in order', () => {
      const seen: string[] = [];
      forEachItem((item: string, i: number) => {
        seen.push(`${i}=${item}`);
      })(['p', 'q', 'r']);

      expect(seen).toEqual(['0=p', '1=q', '2=r']);
    });

    it('should not call the function for an empty array', () => {
      let calls = 0;
      forEachItem(() => {
        calls++;
      })([]);
      expect(calls).toBe(0);
    });
  });

  describe('updateEach', () => {
    it('should rewrite each slot in place', () => {
      const values = [1, 2, 3];
      updateEach((n: number) => n * n)(values);
      expect(values).toEqual([1, 4, 9]);
    });

    it('should pass the index and keep the array identity', () => {
      const values = ['a', 'b'];
      const before = values;
      updateEach((item: string, i: number) => item.repeat(i + 1))(values);

      expect(values).toBe(before);
      expect(values).toEqual(['a', 'bb']);
    });

    it('should let objects be updated through the returned value', () => {
      const counters = [{ hits: 0 }, { hits: 5 }];
      updateEach((c: { hits: number }) => ({ hits: c.hits + 1 }))(counters);
      expect(counters).toEqual([{ hits: 1 }, { hits: 6 }]);
    });
  });

  describe('anyTruthy', () => {
    it('should be false for an empty array', () => {
      expect(anyTruthy([])).toBe(false);
    });

    it('should be true when one element is truthy', () => {
      expect(anyTruthy([0, 0, 1])).toBe(true);
    });

    it('should be false when every element is falsy', () => {
      expect(anyTruthy([0, '', null, undefined, false, Number.NaN])).toBe(false);
    });
  });

  describe('allTruthy', () => {
    it('should be true for an empty array', () => {
      expect(allTruthy([])).toBe(true);
    });

    it('should be false when one element is falsy', () => {
      expect(allTruthy([1, 1, 0])).toBe(false);
    });

    it('should be true when every element is truthy', () => {
      expect(allTruthy([1, 'x', {}, []])).toBe(true);
    });
  });

  describe('contains', () => {
    it('should find a present value', () => {
      expect(contains(2)([1, 2, 3])).toBe(true);
    });

    it('should not find an absent value', () => {
      expect(contains(5)([1, 2, 3])).toBe(false);
    });

    it('should match NaN', () => {
      expect(contains(Number.NaN)([1, Number.NaN])).toBe(true);
    });

    it('should compare objects by identity', () => {
      const item = { id: 1 };
      expect(contains(item)([item])).toBe(true);
      expect(contains({ id: 1 })([item])).toBe(false);
    });
  });

  describe('containsBy', () => {
    it('should match structurally through the predicate', () => {
      const points = [{ x: 1 }, { x: 2 }];
      expect(containsBy((p: { x: number }) => p.x === 2)(points)).toBe(true);
      expect(containsBy((p: { x: number }) => p.x === 3)(points)).toBe(false);
    });

    it('should stop at the first match', () => {
      let calls = 0;
      containsBy((n: number) => {
        calls++;
        return n === 2;
      })([1, 2, 3, 4]);
      expect(calls).toBe(2);
    });
  });
});
