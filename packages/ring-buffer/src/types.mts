import type { BaseLogger } from "@ringwise/logger";

import type { ReadonlyCursor, ReadonlyReverseCursor } from "./cursor.mjs";

/**
 * Logger accepted by the ring buffer. Only reallocations are logged.
 */
export type RingBufferLogger = Pick<BaseLogger, "debug">;

export interface RingBufferOptions<T> {
  /**
   * Capacity reserved at construction
   * @defaultValue 0
   */
  capacity?: number;
  /**
   * Copies one element when the buffer itself is copied (`clone`, `assign`).
   * Errors it throws reach the caller and the target buffer is left as it was.
   * @defaultValue identity
   */
  clone?: (value: T) => T;
  /**
   * Receives a debug record on every reallocation
   */
  logger?: RingBufferLogger;
  /**
   * Included in log records
   * @defaultValue "ring-buffer"
   */
  name?: string;
}

/**
 * Read-only view of a ring buffer
 */
export interface ReadonlyRingBuffer<T> extends Iterable<T> {
  readonly size: number;
  readonly capacity: number;
  isEmpty(): boolean;
  get(index: number): T;
  front(): T;
  back(): T;
  cbegin(): ReadonlyCursor<T>;
  cend(): ReadonlyCursor<T>;
  crbegin(): ReadonlyReverseCursor<T>;
  crend(): ReadonlyReverseCursor<T>;
  toArray(): T[];
  equals(
    other: ReadonlyRingBuffer<T>,
    isEqual?: (a: T, b: T) => boolean,
  ): boolean;
}
