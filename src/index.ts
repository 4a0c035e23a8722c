import { InvalidArgumentError, ResourceExhaustedError } from "./errors";
import * as routines from "./routines";
import { INSERTION_SORT_THRESHOLD } from "./routines";
import {
  type Allocator,
  arrayAllocator,
  byKey,
  type Comparator,
  type CompareFn,
  isSorted,
  lessFromCompare,
  naturalLess,
  type Ordered,
  reverseOrder,
  type Sequence,
  swap,
} from "./sequence";
import {
  argsort,
  insertionSort,
  partitionByRank,
  selectLargest,
  selectSmallest,
  sort,
  sorted,
  type SortOptions,
} from "./sort";
import { setDebug } from "./utils";

export {
  type Allocator,
  argsort,
  arrayAllocator,
  byKey,
  type Comparator,
  type CompareFn,
  INSERTION_SORT_THRESHOLD,
  insertionSort,
  InvalidArgumentError,
  isSorted,
  lessFromCompare,
  naturalLess,
  type Ordered,
  partitionByRank,
  ResourceExhaustedError,
  reverseOrder,
  routines,
  selectLargest,
  selectSmallest,
  type Sequence,
  setDebug,
  sort,
  sorted,
  type SortOptions,
  swap,
};
