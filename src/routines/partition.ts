/**
 * Median-of-three Hoare-style partitioning of a span around `seq[start]`.
 *
 * Both variants walk two cursors inward, never past the span, and return the
 * final index of the pivot. They differ in which side takes elements equal to
 * the pivot.
 */

import { type Comparator, type Sequence, swap } from "../sequence";

function compareExchange<T>(
  seq: Sequence<T>,
  i: number,
  j: number,
  less: Comparator<T>,
) {
  if (less(seq[j], seq[i])) swap(seq, i, j);
}

/**
 * Order the first, middle and last elements of the span with three
 * comparisons, then move the median to `start` as the pivot.
 */
export function medianOfThree<T>(
  seq: Sequence<T>,
  start: number,
  end: number,
  less: Comparator<T>,
): void {
  const mid = start + ((end - start) >> 1);
  const last = end - 1;
  compareExchange(seq, start, mid, less);
  compareExchange(seq, mid, last, less);
  compareExchange(seq, start, mid, less);
  swap(seq, start, mid);
}

/**
 * Partition with equal elements on the right.
 *
 * Afterwards everything before the returned index is less than the pivot, and
 * nothing after it is.
 */
export function partitionRight<T>(
  seq: Sequence<T>,
  start: number,
  end: number,
  less: Comparator<T>,
): number {
  const pivot = seq[start];
  let left = start + 1;
  let right = end - 1;
  while (true) {
    while (left <= right && less(seq[left], pivot)) left++;
    while (left <= right && !less(seq[right], pivot)) right--;
    if (left >= right) break;
    swap(seq, left, right);
    left++;
    right--;
  }
  const pos = left - 1;
  swap(seq, start, pos);
  return pos;
}

/**
 * Partition with equal elements on the left.
 *
 * Afterwards nothing before the returned index is greater than the pivot, and
 * everything after it is.
 */
export function partitionLeft<T>(
  seq: Sequence<T>,
  start: number,
  end: number,
  less: Comparator<T>,
): number {
  const pivot = seq[start];
  let left = start + 1;
  let right = end - 1;
  while (true) {
    while (left <= right && !less(pivot, seq[left])) left++;
    while (left <= right && less(pivot, seq[right])) right--;
    if (left >= right) break;
    swap(seq, left, right);
    left++;
    right--;
  }
  const pos = left - 1;
  swap(seq, start, pos);
  return pos;
}
