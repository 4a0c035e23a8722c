/**
 * @file Public sorting and selection API.
 *
 * Entry points check their arguments and dispatch to the routines by span
 * length and the stability flag:
 *
 * - length <= 5: fixed sorting network (insertion sort when stable),
 * - length < threshold: insertion sort,
 * - otherwise: quicksort, or stable merge sort when `stable` is set.
 *
 * Nothing in the engine is randomized, so identical input, comparator and
 * options always give identical output.
 */

import { InvalidArgumentError } from "./errors";
import {
  INSERTION_SORT_THRESHOLD,
  insertionSortRange,
  MAX_NETWORK_LENGTH,
  mergeSortRange,
  quickSortRange,
  selectRange,
  sortNetwork,
} from "./routines";
import {
  type Allocator,
  type Comparator,
  naturalLess,
  type Ordered,
  reverseOrder,
  type Sequence,
} from "./sequence";
import { DEBUG, isIntegerInRange } from "./utils";

export interface SortOptions<T> {
  /** Keep equal elements in their input order (default false). */
  stable?: boolean;
  /** Spans shorter than this are insertion sorted (default 32). */
  insertionSortThreshold?: number;
  /** Source of the merge buffer when `stable` is set. */
  allocator?: Allocator<T>;
}

function resolveThreshold(fn: string, threshold: number | undefined): number {
  if (threshold === undefined) return INSERTION_SORT_THRESHOLD;
  if (!Number.isInteger(threshold) || threshold < 1) {
    throw new TypeError(
      `${fn}: insertionSortThreshold must be a positive integer, got ${threshold}`,
    );
  }
  return threshold;
}

function sortImpl<T>(
  fn: string,
  seq: Sequence<T>,
  less: Comparator<T>,
  options: SortOptions<T>,
): void {
  const { stable = false, allocator } = options;
  const threshold = resolveThreshold(fn, options.insertionSortThreshold);
  const n = seq.length;
  if (n <= 1) return;

  if (n <= MAX_NETWORK_LENGTH && !stable) {
    if (DEBUG >= 2) console.info(`${fn}: sorting network for ${n} elements`);
    sortNetwork(seq, 0, n, less);
  } else if (n < threshold || n <= MAX_NETWORK_LENGTH) {
    if (DEBUG >= 2) console.info(`${fn}: insertion sort for ${n} elements`);
    insertionSortRange(seq, 0, n, less);
  } else if (stable) {
    if (DEBUG >= 2) console.info(`${fn}: merge sort for ${n} elements`);
    mergeSortRange(seq, 0, n, less, { threshold, allocator });
  } else {
    if (DEBUG >= 2) console.info(`${fn}: quicksort for ${n} elements`);
    quickSortRange(seq, 0, n, less, threshold);
  }
}

/**
 * Sort a sequence in place.
 *
 * This is an unstable sort unless `options.stable` is set, in which case equal
 * elements keep their relative order at the cost of an O(n) buffer. Without a
 * comparator, elements are compared with `naturalLess`.
 */
export function sort<T extends Ordered>(
  seq: Sequence<T>,
  less?: undefined,
  options?: SortOptions<T>,
): void;
export function sort<T>(
  seq: Sequence<T>,
  less: Comparator<T>,
  options?: SortOptions<T>,
): void;
export function sort<T>(
  seq: Sequence<T>,
  less: Comparator<T> = naturalLess,
  options: SortOptions<T> = {},
): void {
  sortImpl("sort", seq, less, options);
}

/** Return a sorted copy of `items` as a new array. */
export function sorted<T extends Ordered>(
  items: Iterable<T> | ArrayLike<T>,
  less?: undefined,
  options?: SortOptions<T>,
): T[];
export function sorted<T>(
  items: Iterable<T> | ArrayLike<T>,
  less: Comparator<T>,
  options?: SortOptions<T>,
): T[];
export function sorted<T>(
  items: Iterable<T> | ArrayLike<T>,
  less: Comparator<T> = naturalLess,
  options: SortOptions<T> = {},
): T[] {
  const copy = Array.from(items);
  sortImpl("sorted", copy, less, options);
  return copy;
}

/**
 * Return indices that would sort a sequence, as an `Int32Array`.
 *
 * Ties may come out in any order unless `options.stable` is set, in which case
 * tied indices are increasing.
 */
export function argsort<T extends Ordered>(
  seq: Sequence<T>,
  less?: undefined,
  options?: Omit<SortOptions<number>, "allocator">,
): Int32Array;
export function argsort<T>(
  seq: Sequence<T>,
  less: Comparator<T>,
  options?: Omit<SortOptions<number>, "allocator">,
): Int32Array;
export function argsort<T>(
  seq: Sequence<T>,
  less: Comparator<T> = naturalLess,
  options: Omit<SortOptions<number>, "allocator"> = {},
): Int32Array {
  const idx = new Int32Array(seq.length);
  for (let i = 0; i < idx.length; i++) idx[i] = i;
  sortImpl("argsort", idx, (i, j) => less(seq[i], seq[j]), {
    ...options,
    allocator: { allocate: (n) => new Int32Array(n) },
  });
  return idx;
}

/** Stable insertion sort of the whole sequence, for input known to be short. */
export function insertionSort<T extends Ordered>(
  seq: Sequence<T>,
  less?: undefined,
): void;
export function insertionSort<T>(seq: Sequence<T>, less: Comparator<T>): void;
export function insertionSort<T>(
  seq: Sequence<T>,
  less: Comparator<T> = naturalLess,
): void {
  insertionSortRange(seq, 0, seq.length, less);
}

/**
 * Partially sort a sequence so that `seq[k]` holds the element that a full
 * sort would put there.
 *
 * Nothing before index `k` compares after `seq[k]`, and nothing after it
 * compares before; each side is otherwise in no particular order.
 */
export function partitionByRank<T extends Ordered>(
  seq: Sequence<T>,
  k: number,
  less?: undefined,
): void;
export function partitionByRank<T>(
  seq: Sequence<T>,
  k: number,
  less: Comparator<T>,
): void;
export function partitionByRank<T>(
  seq: Sequence<T>,
  k: number,
  less: Comparator<T> = naturalLess,
): void {
  if (!isIntegerInRange(k, 0, seq.length - 1)) {
    throw new InvalidArgumentError(
      `partitionByRank: k must be an integer in [0, ${seq.length}), got ${k}`,
    );
  }
  selectRange(seq, 0, seq.length, k, less);
}

function checkCount(fn: string, seq: Sequence<unknown>, k: number) {
  if (!isIntegerInRange(k, 0, seq.length)) {
    throw new InvalidArgumentError(
      `${fn}: k must be an integer in [0, ${seq.length}], got ${k}`,
    );
  }
}

/** Move the `k` smallest elements to the front of `seq`, in no set order. */
export function selectSmallest<T extends Ordered>(
  seq: Sequence<T>,
  k: number,
  less?: undefined,
): void;
export function selectSmallest<T>(
  seq: Sequence<T>,
  k: number,
  less: Comparator<T>,
): void;
export function selectSmallest<T>(
  seq: Sequence<T>,
  k: number,
  less: Comparator<T> = naturalLess,
): void {
  checkCount("selectSmallest", seq, k);
  if (k === 0 || k === seq.length) return;
  selectRange(seq, 0, seq.length, k - 1, less);
}

/** Move the `k` largest elements to the front of `seq`, in no set order. */
export function selectLargest<T extends Ordered>(
  seq: Sequence<T>,
  k: number,
  less?: undefined,
): void;
export function selectLargest<T>(
  seq: Sequence<T>,
  k: number,
  less: Comparator<T>,
): void;
export function selectLargest<T>(
  seq: Sequence<T>,
  k: number,
  less: Comparator<T> = naturalLess,
): void {
  checkCount("selectLargest", seq, k);
  if (k === 0 || k === seq.length) return;
  selectRange(seq, 0, seq.length, k - 1, reverseOrder(less));
}
