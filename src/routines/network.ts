/**
 * Fixed sorting networks for spans of 2 to 5 elements.
 *
 * Each length runs the same compare-exchange steps whatever the data, so the
 * comparison count is constant: 1, 3, 5 and 9 for lengths 2 through 5. The
 * networks are not stable.
 */

import type { Comparator, Sequence } from "../sequence";

/** Number of comparisons `sortNetwork()` makes for each span length. */
export const NETWORK_COMPARISONS: readonly number[] = [0, 0, 1, 3, 5, 9];

/** The longest span with a fixed network. */
export const MAX_NETWORK_LENGTH = 5;

function sort2<T>(seq: Sequence<T>, i: number, j: number, less: Comparator<T>) {
  const a = seq[i];
  const b = seq[j];
  if (less(b, a)) {
    seq[i] = b;
    seq[j] = a;
  }
}

/**
 * Sort three slots given that `j` and `k` are already in order. Always two
 * comparisons.
 */
function sortPartial3<T>(
  seq: Sequence<T>,
  i: number,
  j: number,
  k: number,
  less: Comparator<T>,
) {
  const a = seq[i];
  const b = seq[j];
  const c = seq[k];
  const r = less(c, a);
  const t = r ? c : a;
  if (r) seq[k] = a;
  if (less(b, t)) {
    seq[i] = b;
    seq[j] = t;
  } else if (r) {
    seq[i] = t;
  }
}

/** Sort `seq[start:end]` in place with the network for its length. */
export function sortNetwork<T>(
  seq: Sequence<T>,
  start: number,
  end: number,
  less: Comparator<T>,
): void {
  const s = start;
  switch (end - start) {
    case 0:
    case 1:
      return;
    case 2:
      sort2(seq, s, s + 1, less);
      return;
    case 3:
      sort2(seq, s + 1, s + 2, less);
      sortPartial3(seq, s, s + 1, s + 2, less);
      return;
    case 4:
      sort2(seq, s, s + 2, less);
      sort2(seq, s + 1, s + 3, less);
      sort2(seq, s, s + 1, less);
      sort2(seq, s + 2, s + 3, less);
      sort2(seq, s + 1, s + 2, less);
      return;
    case 5:
      sort2(seq, s, s + 1, less);
      sort2(seq, s + 3, s + 4, less);
      sortPartial3(seq, s + 2, s + 3, s + 4, less);
      sort2(seq, s + 1, s + 4, less);
      sortPartial3(seq, s, s + 2, s + 3, less);
      sortPartial3(seq, s + 1, s + 2, s + 3, less);
      return;
    default:
      throw new RangeError(
        `sortNetwork: no network for span of length ${end - start}`,
      );
  }
}
