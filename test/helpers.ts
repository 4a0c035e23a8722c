/** Deterministic generators and checks for property tests. */

export function range(
  start: number,
  stop?: number,
  step: number = 1,
): number[] {
  if (stop === undefined) {
    stop = start;
    start = 0;
  }
  const result = [];
  for (let i = start; i < stop; i += step) {
    result.push(i);
  }
  return result;
}

export function isPermutation(axis: ArrayLike<number>, n: number): boolean {
  if (axis.length !== n) return false;
  const seen = new Set<number>();
  for (let i = 0; i < axis.length; i++) {
    const x = axis[i];
    if (!Number.isInteger(x) || x < 0 || x >= n) return false;
    seen.add(x);
  }
  return seen.size === n;
}

/** Mulberry32, a small seeded PRNG returning floats in `[0, 1)`. */
export function prng(seed: number): () => number {
  let a = seed >>> 0;
  return () => {
    a = (a + 0x6d2b79f5) >>> 0;
    let t = a;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/** `n` integers drawn uniformly from `[0, max)`. */
export function randomInts(rand: () => number, n: number, max: number): number[] {
  return Array.from({ length: n }, () => Math.floor(rand() * max));
}

/** All permutations of `[0, n)`, in lexicographic order. */
export function permutations(n: number): number[][] {
  if (n === 0) return [[]];
  const result: number[][] = [];
  for (const rest of permutations(n - 1)) {
    for (let i = 0; i <= rest.length; i++) {
      result.push([...rest.slice(0, i), n - 1, ...rest.slice(i)]);
    }
  }
  return result;
}

/** Wrap a comparator so that every call is counted. */
export function counting<T>(less: (a: T, b: T) => boolean): {
  less: (a: T, b: T) => boolean;
  calls: () => number;
} {
  let calls = 0;
  return {
    less: (a, b) => {
      calls++;
      return less(a, b);
    },
    calls: () => calls,
  };
}

/** Multiset equality for arrays of primitives. */
export function sameElements<T>(a: ArrayLike<T>, b: ArrayLike<T>): boolean {
  if (a.length !== b.length) return false;
  const counts = new Map<T, number>();
  for (let i = 0; i < a.length; i++) {
    counts.set(a[i], (counts.get(a[i]) ?? 0) + 1);
  }
  for (let i = 0; i < b.length; i++) {
    const c = counts.get(b[i]);
    if (!c) return false;
    counts.set(b[i], c - 1);
  }
  return true;
}
