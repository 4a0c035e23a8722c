import { describe, expect, it } from "vitest";

import {
  arrayAllocator,
  byKey,
  isSorted,
  lessFromCompare,
  naturalLess,
  reverseOrder,
  swap,
} from "./sequence";

describe("naturalLess()", () => {
  it("orders numbers", () => {
    expect(naturalLess(1, 2)).toBe(true);
    expect(naturalLess(2, 1)).toBe(false);
    expect(naturalLess(2, 2)).toBe(false);
    expect(naturalLess(-Infinity, -1e308)).toBe(true);
  });

  it("orders NaN after every other number", () => {
    expect(naturalLess(Infinity, NaN)).toBe(true);
    expect(naturalLess(NaN, Infinity)).toBe(false);
    expect(naturalLess(NaN, NaN)).toBe(false);
  });

  it("orders strings by code units", () => {
    expect(naturalLess("B", "a")).toBe(true);
    expect(naturalLess("ab", "abc")).toBe(true);
  });

  it("orders bigints, also against numbers", () => {
    expect(naturalLess(1n, 2n)).toBe(true);
    expect(naturalLess(3n, 2.5)).toBe(false);
    expect(naturalLess(2, 3n)).toBe(true);
  });

  it("orders NaN after bigints", () => {
    expect(naturalLess(5n, NaN)).toBe(true);
    expect(naturalLess(NaN, 5n)).toBe(false);
    expect(naturalLess(NaN, -5n)).toBe(false);
  });

  it("throws for values without a natural order", () => {
    expect(() => naturalLess({}, {})).toThrow(
      "naturalLess: cannot compare object with object",
    );
    expect(() => naturalLess("1", 2)).toThrow(
      "naturalLess: cannot compare string with number",
    );
  });
});

describe("comparator helpers", () => {
  it("adapts a three-way compare function", () => {
    const less = lessFromCompare((a: string, b: string) => a.localeCompare(b));
    expect(less("apple", "banana")).toBe(true);
    expect(less("banana", "apple")).toBe(false);
    expect(less("apple", "apple")).toBe(false);
  });

  it("reverses an order", () => {
    const greater = reverseOrder(naturalLess);
    expect(greater(2, 1)).toBe(true);
    expect(greater(1, 2)).toBe(false);
  });

  it("compares by a derived key", () => {
    const byLength = byKey((s: string) => s.length);
    expect(byLength("zz", "aaa")).toBe(true);
    expect(byLength("aaa", "zz")).toBe(false);
  });
});

describe("sequence helpers", () => {
  it("swaps two elements", () => {
    const seq = new Int32Array([1, 2, 3]);
    swap(seq, 0, 2);
    expect(Array.from(seq)).toEqual([3, 2, 1]);
  });

  it("checks sortedness", () => {
    expect(isSorted([])).toBe(true);
    expect(isSorted([1, 1, 2])).toBe(true);
    expect(isSorted([1, 3, 2])).toBe(false);
    expect(isSorted([3, 2, 1], reverseOrder(naturalLess))).toBe(true);
  });

  it("allocates arrays of the requested length", () => {
    expect(arrayAllocator<string>().allocate(4).length).toBe(4);
  });
});
