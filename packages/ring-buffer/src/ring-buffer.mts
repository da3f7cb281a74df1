/**
 * Growable ring buffer
 *
 * Provides amortized O(1) insertion and removal at both ends, O(1) access by
 * logical index and O(n) insertion and removal anywhere else. Logical index
 * `i` lives in physical slot `(head + i) % capacity`.
 *
 * Indexed access, `front`, `back` and the pops perform no bounds checks;
 * calling them out of range or on an empty buffer is undefined behaviour.
 */

import { Cursor, ReverseCursor } from "./cursor.mjs";
import { AllocationError } from "./errors.mjs";
import { assertCapacity, ConstructorValidator } from "./validators.mjs";

import type {
  CursorTarget,
  ReadonlyCursor,
  ReadonlyReverseCursor,
} from "./cursor.mjs";
import type {
  ReadonlyRingBuffer,
  RingBufferLogger,
  RingBufferOptions,
} from "./types.mjs";

const DEFAULT_NAME = "ring-buffer";

function identity<T>(value: T): T {
  return value;
}

export class RingBuffer<T> implements ReadonlyRingBuffer<T>, CursorTarget<T> {
  private slots: T[] = [];
  private allocated = 0;
  private head = 0;
  private count = 0;
  private readonly copyElement: (value: T) => T;
  private readonly logger: RingBufferLogger | undefined;
  private readonly name: string;

  constructor(options: RingBufferOptions<T> = {}) {
    const validator: ConstructorValidator = new ConstructorValidator(
      "RingBuffer",
    );
    validator.optionalFunction("clone", options.clone);
    validator.optionalLogger("logger", options.logger, ["debug"]);
    validator.optionalNonEmptyString("name", options.name);

    this.copyElement = options.clone ?? identity;
    this.logger = options.logger;
    this.name = options.name ?? DEFAULT_NAME;

    if (options.capacity !== undefined) {
      this.reserve(options.capacity);
    }
  }

  /**
   * Build a buffer holding the values of an iterable, front to back
   */
  static from<T>(
    values: Iterable<T>,
    options?: RingBufferOptions<T>,
  ): RingBuffer<T> {
    const buffer = new RingBuffer<T>(options);
    for (const value of values) {
      buffer.pushBack(value);
    }
    return buffer;
  }

  get size(): number {
    return this.count;
  }

  get capacity(): number {
    return this.allocated;
  }

  isEmpty(): boolean {
    return this.count === 0;
  }

  /**
   * Raw storage. A flat index into it is a logical index only while the head
   * sits in slot 0; use {@link physicalIndex} to translate.
   */
  data(): T[] {
    return this.slots;
  }

  /**
   * Physical slot of logical index `index`
   */
  physicalIndex(index: number): number {
    return (this.head + index) % this.allocated;
  }

  get(index: number): T {
    return this.slots[(this.head + index) % this.allocated];
  }

  set(index: number, value: T): void {
    this.slots[(this.head + index) % this.allocated] = value;
  }

  front(): T {
    return this.slots[this.head];
  }

  back(): T {
    return this.get(this.count - 1);
  }

  /**
   * Add an element at the back
   * O(1) amortized, strong guarantee
   */
  pushBack(value: T): void {
    if (this.count === this.allocated) {
      this.grow();
    }
    this.slots[(this.head + this.count) % this.allocated] = value;
    this.count++;
  }

  /**
   * Add an element at the front
   * O(1) amortized, strong guarantee
   */
  pushFront(value: T): void {
    if (this.count === this.allocated) {
      this.grow();
    }
    this.head = (this.head + this.allocated - 1) % this.allocated;
    this.slots[this.head] = value;
    this.count++;
  }

  /**
   * Remove and return the last element
   * O(1)
   */
  popBack(): T {
    const slot = (this.head + this.count - 1) % this.allocated;
    const value = this.slots[slot];
    delete this.slots[slot];
    this.count--;
    return value;
  }

  /**
   * Remove and return the first element
   * O(1)
   */
  popFront(): T {
    const value = this.slots[this.head];
    delete this.slots[this.head];
    this.head = (this.head + 1) % this.allocated;
    this.count--;
    return value;
  }

  /**
   * Ensure room for at least `capacity` elements without reallocating.
   * Live elements are moved to slots `0..size-1`. On failure the buffer is
   * unchanged.
   * O(n)
   */
  reserve(capacity: number): void {
    assertCapacity(capacity);
    if (this.allocated >= capacity) {
      return;
    }

    const slots = this.relocate(capacity, identity);

    // a throwing logger must leave the buffer untouched
    this.logger?.debug("ring buffer storage reallocated", {
      name: this.name,
      from: this.allocated,
      to: capacity,
      size: this.count,
    });

    this.slots = slots;
    this.allocated = capacity;
    this.head = 0;
  }

  /**
   * Insert `value` before the element at `position`, shifting whichever side
   * is shorter. Returns a cursor at the inserted element.
   * O(n), basic guarantee
   */
  insert(position: ReadonlyCursor<T>, value: T): Cursor<T> {
    const distance = position.offset;

    if (distance < Math.floor(this.count / 2)) {
      this.pushFront(value);
      for (let i = 0; i < distance; i++) {
        this.swapElements(i, i + 1);
      }
    } else {
      this.pushBack(value);
      for (let i = this.count - 1; i > distance; i--) {
        this.swapElements(i, i - 1);
      }
    }

    return new Cursor(this, distance);
  }

  /**
   * Remove `[first, last)`, or the single element at `first`, shifting
   * whichever side is shorter. Returns a cursor at the element that followed
   * the removed range.
   * O(n), basic guarantee
   */
  erase(
    first: ReadonlyCursor<T>,
    last: ReadonlyCursor<T> = first.plus(1),
  ): Cursor<T> {
    const removed = last.distance(first);
    const trailing = this.count - last.offset;

    if (trailing < Math.floor(this.count / 2)) {
      for (let i = first.offset; i + removed < this.count; i++) {
        this.swapElements(i, i + removed);
      }
      for (let i = 0; i < removed; i++) {
        this.popBack();
      }
    } else if (removed !== 0) {
      for (let i = last.offset - 1; i >= removed; i--) {
        this.swapElements(i, i - removed);
      }
      for (let i = 0; i < removed; i++) {
        this.popFront();
      }
    }

    return new Cursor(this, first.offset);
  }

  /**
   * Remove every element, keeping the allocated capacity
   * O(n)
   */
  clear(): void {
    while (this.count > 0) {
      this.popBack();
    }
  }

  /**
   * Exchange contents with another buffer. Options stay with each instance.
   * O(1)
   */
  swap(other: RingBuffer<T>): void {
    const { slots, allocated, head, count } = this;

    this.slots = other.slots;
    this.allocated = other.allocated;
    this.head = other.head;
    this.count = other.count;

    other.slots = slots;
    other.allocated = allocated;
    other.head = head;
    other.count = count;
  }

  /**
   * Independent copy with capacity equal to this buffer's size
   * O(n), strong guarantee
   */
  clone(): RingBuffer<T> {
    return this.copyOf(this);
  }

  /**
   * Replace the contents with a copy of `other`. Either the whole copy
   * succeeds or this buffer is left as it was.
   * O(n), strong guarantee
   */
  assign(other: RingBuffer<T>): this {
    if (other !== this) {
      const copy = this.copyOf(other);
      this.swap(copy);
    }
    return this;
  }

  /**
   * Element-wise equality in logical order
   */
  equals(
    other: ReadonlyRingBuffer<T>,
    isEqual: (a: T, b: T) => boolean = Object.is,
  ): boolean {
    if (this.count !== other.size) {
      return false;
    }
    for (let i = 0; i < this.count; i++) {
      if (!isEqual(this.get(i), other.get(i))) {
        return false;
      }
    }
    return true;
  }

  /**
   * True when both buffers use the same storage with the same head and size.
   * Storage is never shared, so this only holds for the same instance.
   */
  sharesStorageWith(other: RingBuffer<T>): boolean {
    return (
      this.slots === other.slots &&
      this.head === other.head &&
      this.count === other.count
    );
  }

  begin(): Cursor<T> {
    return new Cursor(this, 0);
  }

  end(): Cursor<T> {
    return new Cursor(this, this.count);
  }

  cbegin(): ReadonlyCursor<T> {
    return new Cursor(this, 0);
  }

  cend(): ReadonlyCursor<T> {
    return new Cursor(this, this.count);
  }

  crbegin(): ReadonlyReverseCursor<T> {
    return new ReverseCursor(this.end());
  }

  crend(): ReadonlyReverseCursor<T> {
    return new ReverseCursor(this.begin());
  }

  rbegin(): ReverseCursor<T> {
    return new ReverseCursor(this.end());
  }

  rend(): ReverseCursor<T> {
    return new ReverseCursor(this.begin());
  }

  *[Symbol.iterator](): IterableIterator<T> {
    for (let i = 0; i < this.count; i++) {
      yield this.get(i);
    }
  }

  /**
   * Get all elements as an array, front to back
   * O(n)
   */
  toArray(): T[] {
    return Array.from(this);
  }

  private grow(): void {
    this.reserve(this.allocated === 0 ? 1 : this.allocated * 2);
  }

  private swapElements(a: number, b: number): void {
    const first = this.physicalIndex(a);
    const second = this.physicalIndex(b);
    const value = this.slots[first];
    this.slots[first] = this.slots[second];
    this.slots[second] = value;
  }

  private copyOf(source: RingBuffer<T>): RingBuffer<T> {
    const copy = new RingBuffer<T>({
      clone: this.copyElement,
      logger: this.logger,
      name: this.name,
    });
    copy.slots = source.relocate(source.count, this.copyElement);
    copy.allocated = source.count;
    copy.count = source.count;
    return copy;
  }

  /**
   * Fresh storage of `capacity` slots holding this buffer's elements in
   * logical order from slot 0
   */
  private relocate(capacity: number, copyElement: (value: T) => T): T[] {
    let slots: T[];
    try {
      slots = new Array<T>(capacity);
    } catch (error) {
      throw new AllocationError(capacity, this.allocated, error);
    }

    for (let i = 0; i < this.count; i++) {
      slots[i] = copyElement(this.get(i));
    }
    return slots;
  }
}
