/**
 * Error classes for the ring buffer
 */

/**
 * Base error class for all ring-buffer errors
 */
export class RingBufferError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: Record<string, unknown>,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = "RingBufferError";

    // maintain proper stack trace
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Error thrown when a requested capacity is not a non-negative integer
 */
export class InvalidCapacityError extends RingBufferError {
  constructor(public readonly requested: unknown) {
    super(
      `Capacity must be a non-negative integer, got ${String(requested)}`,
      "INVALID_CAPACITY",
      { requested },
    );
    this.name = "InvalidCapacityError";
  }
}

/**
 * Error thrown when storage for the requested capacity cannot be allocated.
 * The buffer that attempted the allocation is left untouched.
 */
export class AllocationError extends RingBufferError {
  constructor(
    public readonly requested: number,
    public readonly current: number,
    cause: unknown,
  ) {
    super(
      `Unable to allocate storage for ${requested} elements (current capacity ${current})`,
      "ALLOCATION_FAILED",
      { requested, current },
      { cause },
    );
    this.name = "AllocationError";
  }
}

export const isRingBufferError = (error: unknown): error is RingBufferError =>
  error instanceof RingBufferError;
