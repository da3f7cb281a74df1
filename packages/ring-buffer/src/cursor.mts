/**
 * Cursors into a ring buffer
 *
 * A cursor is a (target, logical offset) pair. Arithmetic only moves the
 * offset; the physical slot is resolved through the target on every read or
 * write, so a cursor never caches an address. Cursors do not own anything and
 * carry no validity tracking: after a reallocation, insert or erase they may
 * refer to a different element than before.
 */

/**
 * Read access by logical index
 */
export interface ReadonlyCursorTarget<T> {
  get(index: number): T;
}

/**
 * Read and write access by logical index
 */
export interface CursorTarget<T> extends ReadonlyCursorTarget<T> {
  set(index: number, value: T): void;
}

/**
 * Read-only view of a cursor. Every {@link Cursor} is assignable to this type;
 * the reverse is not.
 */
export interface ReadonlyCursor<T> {
  readonly target: ReadonlyCursorTarget<T>;
  readonly offset: number;
  readonly value: T;
  at(n: number): T;
  increment(): this;
  decrement(): this;
  postIncrement(): ReadonlyCursor<T>;
  postDecrement(): ReadonlyCursor<T>;
  advance(n: number): this;
  plus(n: number): ReadonlyCursor<T>;
  minus(n: number): ReadonlyCursor<T>;
  distance(other: ReadonlyCursor<T>): number;
  equals(other: ReadonlyCursor<T>): boolean;
  isBefore(other: ReadonlyCursor<T>): boolean;
  isAfter(other: ReadonlyCursor<T>): boolean;
  isAtOrBefore(other: ReadonlyCursor<T>): boolean;
  isAtOrAfter(other: ReadonlyCursor<T>): boolean;
  clone(): ReadonlyCursor<T>;
}

/**
 * Random-access cursor over the logical positions of a buffer
 */
export class Cursor<T> implements ReadonlyCursor<T> {
  constructor(
    readonly target: CursorTarget<T>,
    private position: number,
  ) {}

  get offset(): number {
    return this.position;
  }

  /**
   * The element at this position
   */
  get value(): T {
    return this.target.get(this.position);
  }

  set value(value: T) {
    this.target.set(this.position, value);
  }

  /**
   * The element `n` positions away
   */
  at(n: number): T {
    return this.target.get(this.position + n);
  }

  setAt(n: number, value: T): void {
    this.target.set(this.position + n, value);
  }

  increment(): this {
    this.position++;
    return this;
  }

  decrement(): this {
    this.position--;
    return this;
  }

  /**
   * Moves forward one position and returns a cursor at the previous one
   */
  postIncrement(): Cursor<T> {
    const previous = this.clone();
    this.position++;
    return previous;
  }

  /**
   * Moves back one position and returns a cursor at the previous one
   */
  postDecrement(): Cursor<T> {
    const previous = this.clone();
    this.position--;
    return previous;
  }

  advance(n: number): this {
    this.position += n;
    return this;
  }

  plus(n: number): Cursor<T> {
    return new Cursor(this.target, this.position + n);
  }

  minus(n: number): Cursor<T> {
    return new Cursor(this.target, this.position - n);
  }

  /**
   * Signed number of positions from `other` to this cursor
   */
  distance(other: ReadonlyCursor<T>): number {
    return this.position - other.offset;
  }

  equals(other: ReadonlyCursor<T>): boolean {
    return this.target === other.target && this.position === other.offset;
  }

  // ordering is only defined between cursors of the same target
  isBefore(other: ReadonlyCursor<T>): boolean {
    return this.target === other.target && this.position < other.offset;
  }

  isAfter(other: ReadonlyCursor<T>): boolean {
    return this.target === other.target && this.position > other.offset;
  }

  isAtOrBefore(other: ReadonlyCursor<T>): boolean {
    return this.target === other.target && this.position <= other.offset;
  }

  isAtOrAfter(other: ReadonlyCursor<T>): boolean {
    return this.target === other.target && this.position >= other.offset;
  }

  clone(): Cursor<T> {
    return new Cursor(this.target, this.position);
  }
}

/**
 * Read-only view of a reverse cursor
 */
export interface ReadonlyReverseCursor<T> {
  readonly base: ReadonlyCursor<T>;
  readonly value: T;
  at(n: number): T;
  increment(): this;
  decrement(): this;
  postIncrement(): ReadonlyReverseCursor<T>;
  postDecrement(): ReadonlyReverseCursor<T>;
  advance(n: number): this;
  plus(n: number): ReadonlyReverseCursor<T>;
  minus(n: number): ReadonlyReverseCursor<T>;
  distance(other: ReadonlyReverseCursor<T>): number;
  equals(other: ReadonlyReverseCursor<T>): boolean;
  isBefore(other: ReadonlyReverseCursor<T>): boolean;
  isAfter(other: ReadonlyReverseCursor<T>): boolean;
  isAtOrBefore(other: ReadonlyReverseCursor<T>): boolean;
  isAtOrAfter(other: ReadonlyReverseCursor<T>): boolean;
  clone(): ReadonlyReverseCursor<T>;
}

/**
 * Cursor walking a buffer back to front.
 *
 * Holds a forward cursor one past the element it designates, so the reverse
 * cursor built from `end()` reads the last element and the one built from
 * `begin()` is the past-the-front sentinel.
 */
export class ReverseCursor<T> implements ReadonlyReverseCursor<T> {
  private readonly current: Cursor<T>;

  constructor(base: Cursor<T>) {
    this.current = base.clone();
  }

  /**
   * The forward cursor one past the designated element
   */
  get base(): Cursor<T> {
    return this.current.clone();
  }

  get value(): T {
    return this.current.at(-1);
  }

  set value(value: T) {
    this.current.setAt(-1, value);
  }

  at(n: number): T {
    return this.current.at(-n - 1);
  }

  increment(): this {
    this.current.decrement();
    return this;
  }

  decrement(): this {
    this.current.increment();
    return this;
  }

  postIncrement(): ReverseCursor<T> {
    const previous = this.clone();
    this.current.decrement();
    return previous;
  }

  postDecrement(): ReverseCursor<T> {
    const previous = this.clone();
    this.current.increment();
    return previous;
  }

  advance(n: number): this {
    this.current.advance(-n);
    return this;
  }

  plus(n: number): ReverseCursor<T> {
    return new ReverseCursor(this.current.minus(n));
  }

  minus(n: number): ReverseCursor<T> {
    return new ReverseCursor(this.current.plus(n));
  }

  distance(other: ReadonlyReverseCursor<T>): number {
    return other.base.distance(this.current);
  }

  equals(other: ReadonlyReverseCursor<T>): boolean {
    return this.current.equals(other.base);
  }

  isBefore(other: ReadonlyReverseCursor<T>): boolean {
    return this.current.isAfter(other.base);
  }

  isAfter(other: ReadonlyReverseCursor<T>): boolean {
    return this.current.isBefore(other.base);
  }

  isAtOrBefore(other: ReadonlyReverseCursor<T>): boolean {
    return this.current.isAtOrAfter(other.base);
  }

  isAtOrAfter(other: ReadonlyReverseCursor<T>): boolean {
    return this.current.isAtOrBefore(other.base);
  }

  clone(): ReverseCursor<T> {
    return new ReverseCursor(this.current);
  }
}
