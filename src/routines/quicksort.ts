/**
 * Iterative quicksort driven by an explicit stack of pending spans.
 *
 * Pivots are the median of three and there is no depth-limited fallback, so
 * the sort is deterministic and O(n log n) on average, but some inputs can
 * still force O(n^2) comparisons. Not stable.
 */

import type { Comparator, Sequence } from "../sequence";
import { DEBUG } from "../utils";
import { INSERTION_SORT_THRESHOLD, insertionSortRange } from "./insertion";
import { MAX_NETWORK_LENGTH, sortNetwork } from "./network";
import { medianOfThree, partitionLeft, partitionRight } from "./partition";

/**
 * Expected stack depth for median-of-three quicksort on `n` elements,
 * `max(2, ceil(1.3 * log2(n)))`. Used only to pre-size the stack.
 */
export function estimateStackHeight(n: number): number {
  if (n <= 1) return 2;
  return Math.max(2, Math.ceil(1.3 * Math.log2(n)));
}

/** Stack of half-open spans, stored as flat `[start, end]` index pairs. */
export class SpanStack {
  #data: number[];
  #size = 0;
  #peak = 0;

  constructor(capacity: number) {
    this.#data = new Array<number>(2 * capacity).fill(0);
  }

  get size(): number {
    return this.#size;
  }

  /** Largest number of spans held at once. */
  get peak(): number {
    return this.#peak;
  }

  push(start: number, end: number): void {
    const top = 2 * this.#size;
    if (top === this.#data.length) {
      this.#data.push(start, end);
    } else {
      this.#data[top] = start;
      this.#data[top + 1] = end;
    }
    this.#size++;
    if (this.#size > this.#peak) this.#peak = this.#size;
  }

  /** Pop the top span. The stack must not be empty. */
  pop(): [number, number] {
    this.#size--;
    const top = 2 * this.#size;
    return [this.#data[top], this.#data[top + 1]];
  }
}

/** Sort `seq[start:end]` in place. */
export function quickSortRange<T>(
  seq: Sequence<T>,
  start: number,
  end: number,
  less: Comparator<T>,
  threshold: number = INSERTION_SORT_THRESHOLD,
): void {
  const stack = new SpanStack(estimateStackHeight(end - start));
  stack.push(start, end);
  let spans = 0;

  while (stack.size > 0) {
    const [lo, hi] = stack.pop();
    const len = hi - lo;
    spans++;
    if (len <= 1) continue;
    if (len <= MAX_NETWORK_LENGTH) {
      sortNetwork(seq, lo, hi, less);
      continue;
    }
    if (len < threshold) {
      insertionSortRange(seq, lo, hi, less);
      continue;
    }

    medianOfThree(seq, lo, hi, less);

    // seq[lo - 1] is a previous pivot bounding this span from below. If it is
    // not less than the new pivot, the span continues a run of that value:
    // gather the run on the left, where it is already in place.
    if (lo > start && !less(seq[lo - 1], seq[lo])) {
      const p = partitionLeft(seq, lo, hi, less);
      if (hi > p + 2) stack.push(p + 1, hi);
      continue;
    }

    const p = partitionRight(seq, lo, hi, less);
    // Push the larger part first, so the smaller one is handled next and the
    // stack stays shallow.
    if (p - lo > hi - p - 1) {
      if (p > lo + 1) stack.push(lo, p);
      if (hi > p + 2) stack.push(p + 1, hi);
    } else {
      if (hi > p + 2) stack.push(p + 1, hi);
      if (p > lo + 1) stack.push(lo, p);
    }
  }

  if (DEBUG >= 3) {
    console.info(
      `quickSort: ${end - start} elements, ${spans} spans, ` +
        `peak stack depth ${stack.peak}`,
    );
  }
}
