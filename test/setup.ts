import { expect } from "vitest";

import { type Comparator, isSorted, naturalLess } from "../src/sequence";

expect.extend({
  toBeSorted(
    received: ArrayLike<unknown>,
    less: Comparator<unknown> = naturalLess,
  ) {
    const { isNot } = this;
    let firstInversion = -1;
    for (let i = 1; i < received.length; i++) {
      if (less(received[i], received[i - 1])) {
        firstInversion = i;
        break;
      }
    }
    return {
      pass: isSorted(received, less),
      message: () =>
        `expected sequence to be${isNot ? " not" : ""} sorted` +
        (firstInversion >= 0 ? `, inversion at index ${firstInversion}` : ""),
      actual: Array.from(received),
    };
  },
});
