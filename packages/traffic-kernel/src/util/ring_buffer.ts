/**
 * Fixed-capacity FIFO backed by a preallocated slot array.
 *
 * push() is O(1) and overwrites the oldest entry once full. Iteration and
 * toArray() always run oldest -> newest.
 */
export class RingBuffer<T> {
  private readonly slots: Array<T | undefined>;
  private head = 0; // index of the oldest entry
  private count = 0;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error(`RingBuffer capacity must be a positive integer (got ${capacity})`);
    }
    this.slots = new Array<T | undefined>(capacity);
  }

  get length(): number {
    return this.count;
  }

  isFull(): boolean {
    return this.count === this.capacity;
  }

  /** Appends `value`; returns the entry it displaced, if any. */
  push(value: T): T | undefined {
    if (this.count < this.capacity) {
      this.slots[(this.head + this.count) % this.capacity] = value;
      this.count++;
      return undefined;
    }
    const evicted = this.slots[this.head];
    this.slots[this.head] = value;
    this.head = (this.head + 1) % this.capacity;
    return evicted;
  }

  shift(): T | undefined {
    if (this.count === 0) return undefined;
    const value = this.slots[this.head];
    this.slots[this.head] = undefined;
    this.head = (this.head + 1) % this.capacity;
    this.count--;
    return value;
  }

  /** index 0 is the oldest entry; negative indexes count back from the newest. */
  at(index: number): T | undefined {
    const i = index < 0 ? this.count + index : index;
    if (i < 0 || i >= this.count) return undefined;
    return this.slots[(this.head + i) % this.capacity];
  }

  peekOldest(): T | undefined {
    return this.at(0);
  }

  peekNewest(): T | undefined {
    return this.at(-1);
  }

  /** Drops entries from the old end while `predicate` holds. */
  dropWhile(predicate: (value: T) => boolean, keepAtLeast = 0): number {
    let dropped = 0;
    while (this.count > keepAtLeast) {
      const oldest = this.slots[this.head];
      if (oldest === undefined || !predicate(oldest)) break;
      this.shift();
      dropped++;
    }
    return dropped;
  }

  clear(): void {
    this.slots.fill(undefined);
    this.head = 0;
    this.count = 0;
  }

  toArray(): T[] {
    const out: T[] = [];
    for (const v of this) out.push(v);
    return out;
  }

  *[Symbol.iterator](): IterableIterator<T> {
    for (let i = 0; i < this.count; i++) {
      const v = this.slots[(this.head + i) % this.capacity];
      if (v !== undefined) yield v;
    }
  }
}
