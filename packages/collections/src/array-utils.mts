/**
 * @module array-utils
 * @description Helpers for ordered sequences: concatenation, mapping,
 * visiting and truthiness checks. Everything except `updateEach` returns a
 * new array and leaves its input untouched.
 *
 * ### For Dummies
 * - `join`/`joinAll` glue arrays together without touching the originals.
 * - `anyTruthy`/`allTruthy` ask "is anything set?" / "is everything set?".
 * - Callback helpers are curried so they drop straight into a pipeline.
 *
 * ### Decision Tree
 * - Two arrays into one? `join(a, b)`.
 * - A list of arrays into one? `joinAll(lists)`.
 * - Transform every element? `mapSequence(fn)`.
 * - Rewrite the elements of an array you own? `updateEach(fn)`.
 * - Membership test? `contains(value)` for primitives, `containsBy(predicate)` for records.
 *
 * @example
 * ```typescript
 * import { join, mapSequence, anyTruthy } from './array-utils.mts';
 *
 * const all = join([1, 2], [3]);
 * // => [1, 2, 3]
 *
 * const labels = mapSequence((n: number, i: number) => `${i}:${n}`)(all);
 * // => ['0:1', '1:2', '2:3']
 *
 * anyTruthy([0, '', null]);
 * // => false
 * ```
 *
 * @category Utilities
 * @since 2026-10-19
 */

/**
 * Concatenate two arrays.
 * @description Elements of `a` come first, then the elements of `b`, each in their original order.
 *
 * @category Combination
 * @example
 * join([1, 2], [3, 4]);
 * // => [1, 2, 3, 4]
 *
 * @see joinAll - Concatenate any number of arrays
 * @since 2026-10-19
 */
export const join = <T,>(a: readonly T[], b: readonly T[]): T[] => {
  const result: T[] = new Array<T>(a.length + b.length);
  let i = 0;
  for (const item of a) {
    result[i++] = item;
  }
  for (const item of b) {
    result[i++] = item;
  }
  return result;
};

/**
 * Concatenate a list of arrays, in list order.
 *
 * @category Combination
 * @example
 * joinAll([[1], [], [2, 3]]);
 * // => [1, 2, 3]
 *
 * joinAll([]);
 * // => []
 *
 * @since 2026-10-19
 */
export const joinAll = <T,>(sequences: readonly (readonly T[])[]): T[] => {
  let total = 0;
  for (const seq of sequences) {
    total += seq.length;
  }

  const result: T[] = new Array<T>(total);
  let i = 0;
  for (const seq of sequences) {
    for (const item of seq) {
      result[i++] = item;
    }
  }
  return result;
};

/**
 * Map over an array.
 * @description Applies `fn` to each element in order. The output has the same length and
 * `output[i]` is always `fn(input[i], i)`.
 *
 * @template T - The type of elements in the input array
 * @template U - The type of elements in the output array
 *
 * @category Transformation
 * @example
 * mapSequence((n: number) => n * 2)([1, 2, 3]);
 * // => [2, 4, 6]
 *
 * @example
 * // Project records to ids
 * const users = [{ id: 7, name: 'Ada' }, { id: 9, name: 'Lin' }];
 * mapSequence((u: typeof users[0]) => u.id)(users);
 * // => [7, 9]
 *
 * @since 2026-10-19
 */
export const mapSequence =
  <T, U>(fn: (item: T, index: number) => U) =>
  (seq: readonly T[]): U[] => {
    const result: U[] = new Array<U>(seq.length);
    for (const [i, item] of seq.entries()) {
      result[i] = fn(item, i);
    }
    return result;
  };

/**
 * Visit every element in order without changing the array.
 * Whatever `fn` does to state it closes over is up to the caller.
 *
 * @category Iteration
 * @example
 * let sum = 0;
 * forEachItem((n: number) => { sum += n; })([1, 2, 3]);
 * // sum === 6
 *
 * @see updateEach - In-place variant
 * @since 2026-10-19
 */
export const forEachItem =
  <T,>(fn: (item: T, index: number) => void) =>
  (seq: readonly T[]): void => {
    for (const [i, item] of seq.entries()) {
      fn(item, i);
    }
  };

/**
 * Rewrite each slot of an array in place.
 * @description `seq[i]` is replaced by `fn(seq[i], i)`, front to back. The callback only ever
 * sees one element at a time and the array itself is never handed out, so it cannot keep a
 * reference past the call. Concurrent callers on the same array must synchronise themselves.
 *
 * @category Iteration
 * @example
 * const prices = [10, 20];
 * updateEach((p: number) => p * 2)(prices);
 * // prices => [20, 40]
 *
 * @see forEachItem - Read-only variant
 * @since 2026-10-19
 */
export const updateEach =
  <T,>(fn: (item: T, index: number) => T) =>
  (seq: T[]): void => {
    for (const [i, item] of seq.entries()) {
      seq[i] = fn(item, i);
    }
  };

/**
 * True if at least one element is truthy. Empty arrays yield `false`.
 *
 * @category Predicates
 * @example
 * anyTruthy([0, 0, 1]);
 * // => true
 * @since 2026-10-19
 */
export const anyTruthy = (seq: readonly unknown[]): boolean => {
  for (const item of seq) {
    if (item) {
      return true;
    }
  }
  return false;
};

/**
 * True if every element is truthy. Empty arrays yield `true`.
 *
 * @category Predicates
 * @example
 * allTruthy([1, 1, 0]);
 * // => false
 * @since 2026-10-19
 */
export const allTruthy = (seq: readonly unknown[]): boolean => {
  for (const item of seq) {
    if (!item) {
      return false;
    }
  }
  return true;
};

/**
 * Membership test by SameValueZero (so `NaN` finds `NaN`). Stops at the first match.
 *
 * @category Search
 * @example
 * contains(2)([1, 2, 3]);
 * // => true
 *
 * @see containsBy - Structural membership
 * @since 2026-10-19
 */
export const contains =
  <T,>(value: T) =>
  (seq: readonly T[]): boolean =>
    seq.includes(value);

/**
 * Membership test by predicate, for elements compared structurally.
 *
 * @category Search
 * @example
 * containsBy((p: { x: number }) => p.x === 2)([{ x: 1 }, { x: 2 }]);
 * // => true
 * @since 2026-10-19
 */
export const containsBy =
  <T,>(predicate: (item: T) => boolean) =>
  (seq: readonly T[]): boolean => {
    for (const item of seq) {
      if (predicate(item)) {
        return true;
      }
    }
    return false;
  };
