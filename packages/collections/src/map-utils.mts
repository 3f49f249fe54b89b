/**
 * @module map-utils
 * @description Helpers for key-unique mappings (`Map`). Transformations
 * return a new `Map` and never mutate the one they are given; only
 * `forEachKey`, `forEachPair` and `updateValues` operate on the caller's map.
 *
 * Iteration order of a result is not part of any contract, even though the
 * built-in `Map` happens to preserve insertion order.
 *
 * ### For Dummies
 * - `mapValues` keeps the keys and swaps the values.
 * - The `filter*` family keeps entries by key, by value, or by both.
 * - `buildMapFrom` indexes a list of records by one of their fields.
 * - `combineMaps` zips two maps with identical keys into one.
 *
 * ### Decision Tree
 * - Have a whitelist of keys? `filterByKeySet(keys)`.
 * - Two maps with the same keys that need merging value by value? `combineMaps`.
 * - Same, but you'd rather get a Result than an exception? `combineMapsSafe`.
 *
 * @example
 * ```typescript
 * import { buildMapFrom, combineMaps } from './map-utils.mts';
 *
 * const byId = buildMapFrom((u: { id: number }) => u.id)([{ id: 1 }, { id: 2 }]);
 * // => Map { 1 => { id: 1 }, 2 => { id: 2 } }
 *
 * const totals = combineMaps(
 *   new Map([['a', 1]]),
 *   new Map([['a', 2]]),
 *   (x: number, y: number) => x + y,
 * );
 * // => Map { 'a' => 3 }
 * ```
 *
 * @category Utilities
 * @since 2026-10-19
 */

import { getCollectionsLogger } from "./config.mjs";
import { ArgumentError } from "./errors.mjs";
import { Result } from "./result.mjs";

/**
 * Map over the values of a Map while keeping its keys.
 *
 * @category Transformation
 * @example
 * mapValues((n: number) => n * 2)(new Map([['a', 1], ['b', 2]]));
 * // => Map { 'a' => 2, 'b' => 4 }
 *
 * @see updateValues - In-place variant
 * @since 2026-10-19
 */
export const mapValues =
  <K, V, U>(fn: (value: V, key: K) => U) =>
  (map: ReadonlyMap<K, V>): Map<K, U> => {
    const result = new Map<K, U>();
    for (const [key, value] of map) {
      result.set(key, fn(value, key));
    }
    return result;
  };

/**
 * Keep the entries for which `predicate(key, value)` holds.
 *
 * @category Selection
 * @example
 * filterEntries((k: string, v: number) => k !== 'b' && v > 1)(
 *   new Map([['a', 1], ['b', 2], ['c', 3]]),
 * );
 * // => Map { 'c' => 3 }
 * @since 2026-10-19
 */
export const filterEntries =
  <K, V>(predicate: (key: K, value: V) => boolean) =>
  (map: ReadonlyMap<K, V>): Map<K, V> => {
    const result = new Map<K, V>();
    for (const [key, value] of map) {
      if (predicate(key, value)) {
        result.set(key, value);
      }
    }
    return result;
  };

/**
 * Keep the entries whose key satisfies `predicate`.
 *
 * @category Selection
 * @since 2026-10-19
 */
export const filterByKeys =
  <K,>(predicate: (key: K) => boolean) =>
  <V,>(map: ReadonlyMap<K, V>): Map<K, V> =>
    filterEntries<K, V>((key) => predicate(key))(map);

/**
 * Keep only the entries whose key is in `keys`.
 * Keys of `keys` that the map lacks are ignored.
 *
 * @category Selection
 * @example
 * const scores = new Map([['k1', 10], ['k2', 20], ['k3', 30]]);
 * filterByKeySet(new Set(['k1', 'k3']))(scores);
 * // => Map { 'k1' => 10, 'k3' => 30 }
 *
 * @see filterByKeys - Arbitrary key predicate
 * @since 2026-10-19
 */
export const filterByKeySet =
  <K,>(keys: ReadonlySet<K>) =>
  <V,>(map: ReadonlyMap<K, V>): Map<K, V> =>
    filterByKeys<K>((key) => keys.has(key))(map);

/**
 * Keep the entries whose value satisfies `predicate`.
 *
 * @category Selection
 * @since 2026-10-19
 */
export const filterByValues =
  <V,>(predicate: (value: V) => boolean) =>
  <K,>(map: ReadonlyMap<K, V>): Map<K, V> =>
    filterEntries<K, V>((_key, value) => predicate(value))(map);

/**
 * Index a list of values by a key derived from each value.
 * @description First wins: when two values produce the same key, the one that comes first in
 * `seq` is kept and the later ones are dropped. Every drop is reported on the toolkit logger at
 * `debug` level.
 *
 * @template K - The derived key type
 * @template V - The element type
 *
 * @category Construction
 * @example
 * buildMapFrom((r: { id: number; v: string }) => r.id)([
 *   { id: 1, v: 'a' },
 *   { id: 1, v: 'b' },
 * ]);
 * // => Map { 1 => { id: 1, v: 'a' } }
 *
 * @since 2026-10-19
 */
export const buildMapFrom =
  <K, V>(keyOf: (value: V) => K) =>
  (seq: readonly V[]): Map<K, V> => {
    const result = new Map<K, V>();
    for (const [index, value] of seq.entries()) {
      const key = keyOf(value);
      if (result.has(key)) {
        getCollectionsLogger().debug("buildMapFrom dropped a duplicate key", {
          key,
          index,
        });
        continue;
      }
      result.set(key, value);
    }
    return result;
  };

/**
 * Combine two maps with identical keysets value by value.
 * Sizes are compared first; the per-key lookup then reports the first key
 * of `map1` that `map2` lacks.
 */
const zipMaps = <K, V1, V2, R>(
  map1: ReadonlyMap<K, V1>,
  map2: ReadonlyMap<K, V2>,
  fn: (left: V1, right: V2, key: K) => R,
): Result<Map<K, R>, ArgumentError> => {
  const logger = getCollectionsLogger();

  if (map1.size !== map2.size) {
    logger.debug("combineMaps size mismatch", {
      leftSize: map1.size,
      rightSize: map2.size,
    });
    return Result.err(ArgumentError.sizeMismatch(map1.size, map2.size));
  }

  // boxed so a present key holding `undefined` still reads as present
  const rights = new Map<K, { value: V2 }>();
  for (const [key, value] of map2) {
    rights.set(key, { value });
  }

  const result = new Map<K, R>();
  for (const [key, left] of map1) {
    const right = rights.get(key);
    if (right === undefined) {
      logger.debug("combineMaps keyset mismatch", { key });
      return Result.err(ArgumentError.keysetMismatch(key));
    }
    result.set(key, fn(left, right.value, key));
  }
  return Result.ok(result);
};

/**
 * Combine two maps that share the same keyset.
 * @description Each key of the result maps to `fn(map1.get(key), map2.get(key), key)`.
 *
 * @throws {ArgumentError} `MAP_SIZE_MISMATCH` when the maps differ in size,
 * `KEYSET_MISMATCH` when a key of `map1` is missing from `map2`
 *
 * @category Combination
 * @example
 * combineMaps(
 *   new Map([[1, 2], [2, 3]]),
 *   new Map([[1, 5], [2, 7]]),
 *   (a: number, b: number) => a + b,
 * );
 * // => Map { 1 => 7, 2 => 10 }
 *
 * @see combineMapsSafe - Returns the failure instead of throwing
 * @since 2026-10-19
 */
export const combineMaps = <K, V1, V2, R>(
  map1: ReadonlyMap<K, V1>,
  map2: ReadonlyMap<K, V2>,
  fn: (left: V1, right: V2, key: K) => R,
): Map<K, R> => {
  const result = zipMaps(map1, map2, fn);
  if (!result.success) {
    throw result.error;
  }
  return result.data;
};

/**
 * Combine two maps that share the same keyset, returning a Result.
 *
 * @category Combination
 * @example
 * const result = combineMapsSafe(new Map([[1, 2]]), new Map(), (a: number, b: number) => a + b);
 * if (!result.success) {
 *   console.log(result.error.code);
 *   // => 'MAP_SIZE_MISMATCH'
 * }
 *
 * @see combineMaps - Throwing variant
 * @since 2026-10-19
 */
export const combineMapsSafe = <K, V1, V2, R>(
  map1: ReadonlyMap<K, V1>,
  map2: ReadonlyMap<K, V2>,
  fn: (left: V1, right: V2, key: K) => R,
): Result<Map<K, R>, ArgumentError> => zipMaps(map1, map2, fn);

/**
 * Keys of a Map as a new array; `length === map.size`.
 *
 * @category Extraction
 * @since 2026-10-19
 */
export const keysOf = <K, V>(map: ReadonlyMap<K, V>): K[] =>
  Array.from(map.keys());

/**
 * Values of a Map as a new array; `length === map.size`.
 *
 * @category Extraction
 * @since 2026-10-19
 */
export const valuesOf = <K, V>(map: ReadonlyMap<K, V>): V[] =>
  Array.from(map.values());

/**
 * Visit every key of a Map.
 * Object keys are handed over by reference. Mutating one so that it now
 * describes the same thing as another key is the caller's problem: the Map
 * itself keeps them apart by identity.
 *
 * @category Iteration
 * @since 2026-10-19
 */
export const forEachKey =
  <K,>(fn: (key: K) => void) =>
  <V,>(map: Map<K, V>): void => {
    for (const key of map.keys()) {
      fn(key);
    }
  };

/**
 * Visit every `(key, value)` pair of a Map, by reference for object keys and values.
 *
 * @category Iteration
 * @see forEachKey
 * @since 2026-10-19
 */
export const forEachPair =
  <K, V>(fn: (key: K, value: V) => void) =>
  (map: Map<K, V>): void => {
    for (const [key, value] of map) {
      fn(key, value);
    }
  };

/**
 * Replace every value of a Map in place with `fn(value, key)`.
 * The key set does not change.
 *
 * @category Iteration
 * @example
 * const stock = new Map([['apples', 3]]);
 * updateValues((n: number) => n - 1)(stock);
 * // stock => Map { 'apples' => 2 }
 *
 * @see mapValues - Non-mutating variant
 * @since 2026-10-19
 */
export const updateValues =
  <K, V>(fn: (value: V, key: K) => V) =>
  (map: Map<K, V>): void => {
    for (const [key, value] of map) {
      map.set(key, fn(value, key));
    }
  };
