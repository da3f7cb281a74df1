/**
 * Growable double-ended ring buffer with random-access cursors
 *
 * @packageDocumentation
 */

export { RingBuffer } from "./ring-buffer.mjs";
export { Cursor, ReverseCursor } from "./cursor.mjs";
export type {
  CursorTarget,
  ReadonlyCursor,
  ReadonlyCursorTarget,
  ReadonlyReverseCursor,
} from "./cursor.mjs";
export {
  AllocationError,
  InvalidCapacityError,
  isRingBufferError,
  RingBufferError,
} from "./errors.mjs";
export type {
  ReadonlyRingBuffer,
  RingBufferLogger,
  RingBufferOptions,
} from "./types.mjs";
