import type { Comparator, Sequence } from "../sequence";

/** Below this span length, sorting falls back to insertion sort. */
export const INSERTION_SORT_THRESHOLD = 32;

/**
 * Stable insertion sort of `seq[start:end]`, in place.
 *
 * Runs in O(n + d) for d inversions, so it is linear on nearly-sorted input.
 */
export function insertionSortRange<T>(
  seq: Sequence<T>,
  start: number,
  end: number,
  less: Comparator<T>,
): void {
  for (let i = start + 1; i < end; i++) {
    const value = seq[i];
    let j = i;
    // Only move past elements that must come after `value`, for stability.
    while (j > start && less(value, seq[j - 1])) {
      seq[j] = seq[j - 1];
      j--;
    }
    seq[j] = value;
  }
}
