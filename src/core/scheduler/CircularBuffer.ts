export class CircularBuffer<T> {
  private readonly buffer: Array<T | undefined>;
  private head = 0;
  private tail = 0;
  private count = 0;

  constructor(readonly capacity: number) {
    this.buffer = Array.from({ length: capacity }, () => undefined);
  }

  get size(): number {
    return this.count;
  }

  isEmpty(): boolean {
    return this.count === 0;
  }

  isFull(): boolean {
    return this.count === this.capacity;
  }

  /** Returns the slot the value landed in, or null when full. */
  push(value: T): number | null {
    if (this.isFull()) return null;
    const slot = this.tail;
    this.buffer[slot] = value;
    this.tail = (this.tail + 1) % this.capacity;
    this.count++;
    return slot;
  }

  peek(): T | null {
    return this.isEmpty() ? null : this.slotValue(this.head);
  }

  pop(): T | null {
    if (this.isEmpty()) return null;
    const value = this.slotValue(this.head);
    this.buffer[this.head] = undefined;
    this.head = (this.head + 1) % this.capacity;
    this.count--;
    return value;
  }

  /** Entry `offset` positions behind the head, or null past the tail. */
  at(offset: number): T | null {
    if (!Number.isInteger(offset) || offset < 0 || offset >= this.count) return null;
    return this.slotValue((this.head + offset) % this.capacity);
  }

  /**
   * Drops the newest entries until `keep` remain, returning the dropped ones
   * oldest first.
   */
  truncate(keep: number): T[] {
    const dropped: T[] = [];
    while (this.count > keep) {
      this.tail = (this.tail - 1 + this.capacity) % this.capacity;
      dropped.unshift(this.slotValue(this.tail));
      this.buffer[this.tail] = undefined;
      this.count--;
    }
    return dropped;
  }

  *[Symbol.iterator](): IterableIterator<T> {
    for (let i = 0; i < this.count; i++) {
      yield this.slotValue((this.head + i) % this.capacity);
    }
  }

  *reverse(): IterableIterator<T> {
    for (let i = this.count - 1; i >= 0; i--) {
      yield this.slotValue((this.head + i) % this.capacity);
    }
  }

  private slotValue(slot: number): T {
    const value = this.buffer[slot];
    if (value === undefined) {
      throw new Error(`Circular buffer slot ${slot} is empty`);
    }
    return value;
  }
}
