import type { Comparator, Sequence } from "../sequence";
import { medianOfThree, partitionLeft, partitionRight } from "./partition";

/**
 * Quickselect: rearrange `seq[start:end]` so that `seq[k]` holds the element a
 * full sort would put there, with nothing greater before it and nothing less
 * after it.
 *
 * Narrows the live span around `k` one partition at a time. Average O(n), but
 * shares the worst case of quicksort since it uses the same pivots. The rank
 * `k` must lie in `[start, end)`.
 */
export function selectRange<T>(
  seq: Sequence<T>,
  start: number,
  end: number,
  k: number,
  less: Comparator<T>,
): void {
  let lo = start;
  let hi = end;
  while (hi - lo > 1) {
    medianOfThree(seq, lo, hi, less);

    // Same run rule as quicksort: seq[lo - 1] bounds the span from below, so
    // if the pivot equals it, everything up to the returned index is a run of
    // the pivot's value and already in place.
    if (lo > start && !less(seq[lo - 1], seq[lo])) {
      const p = partitionLeft(seq, lo, hi, less);
      if (k <= p) return;
      lo = p + 1;
      continue;
    }

    const p = partitionRight(seq, lo, hi, less);
    if (p === k) return;
    if (k < p) {
      hi = p;
    } else {
      lo = p + 1;
    }
  }
}
