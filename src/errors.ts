/** @file Error classes raised at the public API boundary. */

/** An argument outside the range the operation accepts, such as a bad rank. */
export class InvalidArgumentError extends RangeError {
  constructor(message: string) {
    super(message);
    this.name = "InvalidArgumentError";
  }
}

/**
 * A temporary buffer could not be allocated. The original error from the
 * allocator, if any, is kept as `cause`.
 */
export class ResourceExhaustedError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ResourceExhaustedError";
  }
}
