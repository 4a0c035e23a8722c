/**
 * Stable bottom-up merge sort using one temporary buffer.
 *
 * The span is cut into blocks of `threshold` elements that are insertion
 * sorted, then adjacent runs are merged with doubling width:
 *
 *   for width = threshold, 2*threshold, ... while width < n:
 *     for lo = start, start + 2*width, ... while lo + width < end:
 *       merge(seq[lo:lo+width], seq[lo+width:min(lo+2*width, end)]) via buf
 *
 * Ties always take the element from the left run, which keeps the sort
 * stable. Requires O(n) auxiliary space.
 */

import { ResourceExhaustedError } from "../errors";
import {
  type Allocator,
  arrayAllocator,
  type Comparator,
  type Sequence,
} from "../sequence";
import { DEBUG } from "../utils";
import { INSERTION_SORT_THRESHOLD, insertionSortRange } from "./insertion";

export interface MergeSortOptions<T> {
  /** Size of the insertion-sorted blocks (default 32). */
  threshold?: number;
  /** Source of the temporary buffer (default: plain arrays). */
  allocator?: Allocator<T>;
}

function allocateBuffer<T>(allocator: Allocator<T>, n: number): Sequence<T> {
  let buffer: Sequence<T>;
  try {
    buffer = allocator.allocate(n);
  } catch (error) {
    if (error instanceof RangeError) {
      throw new ResourceExhaustedError(
        `mergeSort: could not allocate buffer of ${n} elements`,
        { cause: error },
      );
    }
    throw error;
  }
  if (buffer.length < n) {
    allocator.release?.(buffer);
    throw new ResourceExhaustedError(
      `mergeSort: allocator returned ${buffer.length} elements, needed ${n}`,
    );
  }
  return buffer;
}

/**
 * Merge the sorted runs `seq[lo:mid]` and `seq[mid:hi]` through `buf`, which
 * is indexed from `offset`.
 */
function merge<T>(
  seq: Sequence<T>,
  buf: Sequence<T>,
  offset: number,
  lo: number,
  mid: number,
  hi: number,
  less: Comparator<T>,
) {
  let i = lo;
  let j = mid;
  let k = lo - offset;
  while (i < mid && j < hi) {
    if (less(seq[j], seq[i])) {
      buf[k++] = seq[j++];
    } else {
      buf[k++] = seq[i++];
    }
  }
  while (i < mid) buf[k++] = seq[i++];
  while (j < hi) buf[k++] = seq[j++];

  for (let t = lo; t < hi; t++) {
    seq[t] = buf[t - offset];
  }
}

/** Stable sort of `seq[start:end]` in place. */
export function mergeSortRange<T>(
  seq: Sequence<T>,
  start: number,
  end: number,
  less: Comparator<T>,
  options: MergeSortOptions<T> = {},
): void {
  const threshold = options.threshold ?? INSERTION_SORT_THRESHOLD;
  const allocator = options.allocator ?? arrayAllocator<T>();
  const n = end - start;
  if (n <= 1) return;

  const block = Math.max(1, threshold);
  if (block >= n) {
    insertionSortRange(seq, start, end, less);
    return;
  }

  // Allocate before touching `seq`, so a failure leaves it unchanged.
  const buf = allocateBuffer(allocator, n);
  if (DEBUG >= 3) {
    console.info(`mergeSort: allocated buffer of ${n} elements`);
  }
  try {
    for (let lo = start; lo < end; lo += block) {
      insertionSortRange(seq, lo, Math.min(lo + block, end), less);
    }
    for (let width = block; width < n; width *= 2) {
      for (let lo = start; lo + width < end; lo += 2 * width) {
        const mid = lo + width;
        const hi = Math.min(lo + 2 * width, end);
        // Runs already in order need no merge.
        if (!less(seq[mid], seq[mid - 1])) continue;
        merge(seq, buf, start, lo, mid, hi, less);
      }
    }
  } finally {
    allocator.release?.(buf);
  }
}
