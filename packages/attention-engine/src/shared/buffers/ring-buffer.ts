/**
 * Fixed-capacity FIFO history. Appending to a full buffer evicts the oldest
 * sample. Instances are immutable: `append` returns a new buffer, so a frame
 * that fails half-way never leaves a partially updated history behind.
 */
export class RingBuffer<T> {
  readonly capacity: number;

  private readonly items: readonly T[];

  private constructor(capacity: number, items: readonly T[]) {
    this.capacity = capacity;
    this.items = items;
  }

  static create<T>(
    capacity: number,
    initial: readonly T[] = [],
  ): RingBuffer<T> {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new RangeError(
        `Ring buffer capacity must be a positive integer, got ${capacity}`,
      );
    }
    const items =
      initial.length > capacity ? initial.slice(-capacity) : initial.slice();
    return new RingBuffer(capacity, items);
  }

  get size(): number {
    return this.items.length;
  }

  get isFull(): boolean {
    return this.items.length >= this.capacity;
  }

  append(value: T): RingBuffer<T> {
    const start = this.items.length >= this.capacity ? 1 : 0;
    const next = this.items.slice(start);
    next.push(value);
    return new RingBuffer(this.capacity, next);
  }

  /** Most recent `count` samples, oldest first. */
  last(count: number): T[] {
    if (count <= 0) {
      return [];
    }
    return this.items.slice(-count);
  }

  toArray(): T[] {
    return this.items.slice();
  }
}
