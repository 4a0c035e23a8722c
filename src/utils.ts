/** @file Generic programming utilities with no dependencies on library code. */

/**
 * Debug logging level. Routines log through `console.info` when this is at
 * least the level they check for: 2 for dispatch decisions, 3 for per-call
 * statistics.
 */
export let DEBUG: number = 0;

/** Set the debug logging level, 0 to disable all logging. */
export function setDebug(level: number): void {
  DEBUG = level;
}

/** Check that `x` is an integer in `[min, max]`. */
export function isIntegerInRange(x: number, min: number, max: number): boolean {
  return Number.isInteger(x) && x >= min && x <= max;
}
