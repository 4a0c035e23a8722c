import { bench, suite } from "vitest";

import { naturalLess, partitionByRank, sort } from "../src";
import { prng, randomInts } from "../test/helpers";

const size = 100_000;
const random = randomInts(prng(0), size, 1e9);
const fewDistinct = randomInts(prng(1), size, 16);
const ascending = Array.from({ length: size }, (_, i) => i);

suite("sort 100k numbers", () => {
  for (const [name, data] of [
    ["random", random],
    ["few distinct", fewDistinct],
    ["ascending", ascending],
  ] as const) {
    bench(`quicksort, ${name}`, () => {
      sort([...data]);
    });

    bench(`merge sort, ${name}`, () => {
      sort([...data], naturalLess, { stable: true });
    });

    bench(`Array.prototype.sort, ${name}`, () => {
      [...data].sort((a, b) => a - b);
    });
  }
});

suite("select median of 100k numbers", () => {
  bench("partitionByRank", () => {
    partitionByRank([...random], size >> 1);
  });

  bench("full sort", () => {
    sort([...random]);
  });
});
