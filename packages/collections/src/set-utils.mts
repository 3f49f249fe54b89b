/**
 * @module set-utils
 * @description Ordered and unordered sets. Unordered sets are the built-in
 * `Set`; `OrderedSet` keeps its elements in a sorted, deduplicated array so
 * that it iterates in ascending order and intersects by a linear merge.
 *
 * ### Decision Tree
 * - Need sorted, unique output? `toOrderedSet(items)`.
 * - Only need uniqueness? `toUnorderedSet(items)`.
 * - Elements that aren't numbers, strings, bigints or dates? `toOrderedSetBy(compare)`.
 *
 * @example
 * ```typescript
 * import { toOrderedSet, intersect } from './set-utils.mts';
 *
 * toOrderedSet([3, 1, 2, 1]).toArray();
 * // => [1, 2, 3]
 *
 * intersect(toOrderedSet([1, 2, 3]), toOrderedSet([2, 3, 4])).toArray();
 * // => [2, 3]
 * ```
 *
 * @category Utilities
 * @since 2026-10-19
 */

export type Comparator<T> = (a: T, b: T) => number;

/** Element types with a built-in natural ordering. */
export type NaturallyOrdered = number | string | bigint | Date;

// numbers < bigints < strings < dates when kinds differ
const kindRank = (value: NaturallyOrdered): number => {
  if (value instanceof Date) return 3;
  switch (typeof value) {
    case "number":
      return 0;
    case "bigint":
      return 1;
    default:
      return 2;
  }
};

/**
 * Ascending order for numbers, strings, bigints and dates (by timestamp).
 * Strings compare by UTF-16 code units, like `<`. Values of different kinds
 * never compare equal: numbers sort first, then bigints, strings and dates.
 */
export const naturalOrder = (a: NaturallyOrdered, b: NaturallyOrdered): number => {
  const rank = kindRank(a) - kindRank(b);
  if (rank !== 0) return rank < 0 ? -1 : 1;
  const left = a instanceof Date ? a.getTime() : a;
  const right = b instanceof Date ? b.getTime() : b;
  if (left < right) return -1;
  if (left > right) return 1;
  return 0;
};

/**
 * A set whose elements are unique under `compare` and always iterate in
 * ascending order.
 */
export class OrderedSet<T> implements Iterable<T> {
  private constructor(
    private readonly elements: readonly T[],
    readonly compare: Comparator<T>,
  ) {}

  /**
   * Sorts and deduplicates `items` by `compare`. Of several elements that
   * compare equal, the first one encountered is kept.
   */
  static from<T>(items: Iterable<T>, compare: Comparator<T>): OrderedSet<T> {
    // Array.prototype.sort is stable, so equal runs keep encounter order
    const sorted = Array.from(items).sort(compare);
    const unique: T[] = [];
    for (const item of sorted) {
      if (unique.length === 0 || compare(unique[unique.length - 1], item) !== 0) {
        unique.push(item);
      }
    }
    return new OrderedSet(unique, compare);
  }

  /** Same as `from`, ordered by {@link naturalOrder}. */
  static of<T extends NaturallyOrdered>(items: Iterable<T>): OrderedSet<T> {
    return OrderedSet.from<T>(items, naturalOrder);
  }

  get size(): number {
    return this.elements.length;
  }

  isEmpty(): boolean {
    return this.elements.length === 0;
  }

  /** Binary search over the sorted elements. */
  has(element: T): boolean {
    let low = 0;
    let high = this.elements.length - 1;
    while (low <= high) {
      const mid = (low + high) >>> 1;
      const cmp = this.compare(this.elements[mid], element);
      if (cmp === 0) return true;
      if (cmp < 0) low = mid + 1;
      else high = mid - 1;
    }
    return false;
  }

  toArray(): T[] {
    return this.elements.slice();
  }

  equals(other: OrderedSet<T>): boolean {
    if (this.size !== other.size) return false;
    if (other.compare !== this.compare) {
      return this.elements.every((element) => other.has(element));
    }
    const theirs = other.elements;
    return this.elements.every(
      (element, i) => this.compare(element, theirs[i]) === 0,
    );
  }

  *[Symbol.iterator](): Iterator<T> {
    yield* this.elements;
  }

  toString(): string {
    return `OrderedSet {${this.elements.map(String).join(", ")}}`;
  }

  /**
   * Merge walk over both sorted arrays; linear in their combined size.
   * When `other` is ordered by a different comparator, each element of this
   * set is looked up in `other` instead. The result uses this set's comparator.
   */
  intersection(other: OrderedSet<T>): OrderedSet<T> {
    if (other.compare !== this.compare) {
      return new OrderedSet(
        this.elements.filter((element) => other.has(element)),
        this.compare,
      );
    }
    const a = this.elements;
    const b = other.elements;
    const result: T[] = [];
    let i = 0;
    let j = 0;
    while (i < a.length && j < b.length) {
      const cmp = this.compare(a[i], b[j]);
      if (cmp < 0) i++;
      else if (cmp > 0) j++;
      else {
        result.push(a[i]);
        i++;
        j++;
      }
    }
    return new OrderedSet(result, this.compare);
  }
}

/**
 * Deduplicate and sort a sequence by natural ordering.
 *
 * @category Conversion
 * @example
 * toOrderedSet([3, 1, 2, 1]).toArray();
 * // => [1, 2, 3]
 *
 * @see toOrderedSetBy - Custom ordering
 * @since 2026-10-19
 */
export const toOrderedSet = <T extends NaturallyOrdered>(
  seq: readonly T[],
): OrderedSet<T> => OrderedSet.of(seq);

/**
 * Deduplicate and sort a sequence by a comparator. Elements the comparator
 * deems equal collapse into the first one encountered.
 *
 * @category Conversion
 * @example
 * const byLength = toOrderedSetBy((x: string, y: string) => x.length - y.length);
 * byLength(['ccc', 'a', 'bb', 'd']).toArray();
 * // => ['a', 'bb', 'ccc']
 *
 * @since 2026-10-19
 */
export const toOrderedSetBy =
  <T,>(compare: Comparator<T>) =>
  (seq: readonly T[]): OrderedSet<T> =>
    OrderedSet.from(seq, compare);

/**
 * Deduplicate a sequence; no ordering guarantee.
 *
 * @category Conversion
 * @since 2026-10-19
 */
export const toUnorderedSet = <T,>(seq: readonly T[]): Set<T> => new Set(seq);

/**
 * Elements present in both sets.
 * @description Ordered sets intersect by a merge walk and give back an `OrderedSet`; unordered
 * sets probe the larger set with each element of the smaller one and give back a `Set`.
 *
 * @category Combination
 * @example
 * intersect(new Set([1, 2, 3]), new Set([2, 3, 4]));
 * // => Set {2, 3}
 *
 * @since 2026-10-19
 */
export function intersect<T>(a: OrderedSet<T>, b: OrderedSet<T>): OrderedSet<T>;
export function intersect<T>(a: ReadonlySet<T>, b: ReadonlySet<T>): Set<T>;
export function intersect<T>(
  a: OrderedSet<T> | ReadonlySet<T>,
  b: OrderedSet<T> | ReadonlySet<T>,
): OrderedSet<T> | Set<T> {
  if (a instanceof OrderedSet && b instanceof OrderedSet) {
    return a.intersection(b);
  }
  if (a instanceof OrderedSet || b instanceof OrderedSet) {
    throw new TypeError("intersect expects two sets of the same kind");
  }

  const [smaller, larger] = a.size <= b.size ? [a, b] : [b, a];
  const result = new Set<T>();
  for (const element of smaller) {
    if (larger.has(element)) {
      result.add(element);
    }
  }
  return result;
}
