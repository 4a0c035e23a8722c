import { expect, suite, test } from "vitest";

import { counting, permutations } from "../../test/helpers";
import { naturalLess } from "../sequence";
import { NETWORK_COMPARISONS, sortNetwork } from "./network";

suite("sortNetwork()", () => {
  for (let n = 2; n <= 5; n++) {
    test(`sorts every permutation of length ${n}`, () => {
      for (const perm of permutations(n)) {
        const seq = [...perm];
        sortNetwork(seq, 0, n, naturalLess);
        expect(seq).toEqual([...perm].sort((a, b) => a - b));
      }
    });

    test(`sorts every length-${n} input drawn from ${n} values`, () => {
      const total = n ** n;
      for (let code = 0; code < total; code++) {
        const seq: number[] = [];
        for (let c = code, i = 0; i < n; i++, c = Math.floor(c / n)) {
          seq.push(c % n);
        }
        const expected = [...seq].sort((a, b) => a - b);
        sortNetwork(seq, 0, n, naturalLess);
        expect(seq).toEqual(expected);
      }
    });

    test(`uses ${NETWORK_COMPARISONS[n]} comparisons for length ${n}`, () => {
      const seen = new Set<number>();
      for (const perm of permutations(n)) {
        const { less, calls } = counting(naturalLess);
        sortNetwork([...perm], 0, n, less);
        seen.add(calls());
      }
      expect([...seen]).toEqual([NETWORK_COMPARISONS[n]]);
    });
  }

  test("comparison counts are 1, 3, 5, 9", () => {
    expect(NETWORK_COMPARISONS.slice(2)).toEqual([1, 3, 5, 9]);
  });

  test("only touches the given span", () => {
    const seq = [9, 8, 5, 3, 1, 4, 2, 0];
    sortNetwork(seq, 2, 7, naturalLess);
    expect(seq).toEqual([9, 8, 1, 2, 3, 4, 5, 0]);
  });

  test("empty and single spans are no-ops", () => {
    const { less, calls } = counting(naturalLess);
    const seq = [2, 1];
    sortNetwork(seq, 0, 0, less);
    sortNetwork(seq, 1, 2, less);
    expect(seq).toEqual([2, 1]);
    expect(calls()).toBe(0);
  });

  test("throws for spans longer than 5", () => {
    expect(() => sortNetwork([6, 5, 4, 3, 2, 1], 0, 6, naturalLess)).toThrow(
      "no network for span of length 6",
    );
  });
});
