/**
 * Barrel export for the low-level routines. Each works on a half-open span
 * `[start, end)` of a sequence and does no argument checking.
 */

export { INSERTION_SORT_THRESHOLD, insertionSortRange } from "./insertion";
export { mergeSortRange, type MergeSortOptions } from "./merge-sort";
export {
  MAX_NETWORK_LENGTH,
  NETWORK_COMPARISONS,
  sortNetwork,
} from "./network";
export { medianOfThree, partitionLeft, partitionRight } from "./partition";
export { estimateStackHeight, quickSortRange, SpanStack } from "./quicksort";
export { selectRange } from "./select";
