/**
 * @file Data model shared by all routines: sequences, comparators and the
 * allocators that back temporary buffers.
 */

/**
 * A mutable, random-access, 0-indexed collection. Plain arrays and typed arrays
 * both satisfy this interface.
 */
export interface Sequence<T> {
  readonly length: number;
  [index: number]: T;
}

/** Returns true when `a` must sort before `b`. Must be a strict weak ordering. */
export type Comparator<T> = (a: T, b: T) => boolean;

/** Three-way comparison in the style of `Array.prototype.sort()`. */
export type CompareFn<T> = (a: T, b: T) => number;

/** Values with a natural ordering, accepted by `naturalLess`. */
export type Ordered = number | string | bigint;

/**
 * The natural "less than" ordering.
 *
 * Numbers compare numerically, with NaN after every other number so that the
 * order stays a strict weak ordering. Strings compare by UTF-16 code units, as
 * with `<`. Bigints compare with each other and with numbers.
 */
export function naturalLess(a: unknown, b: unknown): boolean {
  if (typeof a === "number" && typeof b === "number") {
    // NaN goes to end
    return a < b || (isNaN(b) && !isNaN(a));
  }
  if (typeof a === "string" && typeof b === "string") {
    return a < b;
  }
  if (
    (typeof a === "bigint" || typeof a === "number") &&
    (typeof b === "bigint" || typeof b === "number")
  ) {
    if (typeof a === "number" && isNaN(a)) return false;
    if (typeof b === "number" && isNaN(b)) return true;
    return a < b;
  }
  throw new TypeError(
    `naturalLess: cannot compare ${typeof a} with ${typeof b}`,
  );
}

/** Adapt a three-way compare function into a boolean comparator. */
export function lessFromCompare<T>(compare: CompareFn<T>): Comparator<T> {
  return (a, b) => compare(a, b) < 0;
}

/** The comparator with the opposite order. */
export function reverseOrder<T>(less: Comparator<T>): Comparator<T> {
  return (a, b) => less(b, a);
}

/** Order records by a derived key, using `less` on the keys. */
export function byKey<T, K>(
  key: (item: T) => K,
  less: Comparator<K> = naturalLess,
): Comparator<T> {
  return (a, b) => less(key(a), key(b));
}

export function swap<T>(seq: Sequence<T>, i: number, j: number): void {
  const tmp = seq[i];
  seq[i] = seq[j];
  seq[j] = tmp;
}

/** Check that no adjacent pair of `seq` is out of order. */
export function isSorted<T>(
  seq: ArrayLike<T>,
  less: Comparator<T> = naturalLess,
): boolean {
  for (let i = 1; i < seq.length; i++) {
    if (less(seq[i], seq[i - 1])) return false;
  }
  return true;
}

/** Supplies scratch buffers to the stable merge sort. */
export interface Allocator<T> {
  /** Return a buffer holding at least `length` elements. */
  allocate(length: number): Sequence<T>;
  /** Called once the buffer is no longer used, on every exit path. */
  release?(buffer: Sequence<T>): void;
}

/** The default allocator, backed by plain arrays. */
export function arrayAllocator<T>(): Allocator<T> {
  return {
    allocate: (length) => new Array<T>(length),
  };
}
