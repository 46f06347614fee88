/**
 * CircularBuffer — fixed-capacity window that overwrites its oldest entry.
 *
 * Iteration order is always oldest → newest.
 */
export class CircularBuffer<T> {
  private slots: T[] = [];
  /** Index of the oldest entry once the buffer has filled */
  private oldest = 0;
  readonly capacity: number;

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`CircularBuffer capacity must be an integer >= 1, got ${capacity}`);
    }
    this.capacity = capacity;
  }

  /**
   * Append an item. Returns the entry it displaced, if the buffer was full.
   */
  push(item: T): T | undefined {
    if (this.slots.length < this.capacity) {
      this.slots.push(item);
      return undefined;
    }
    const displaced = this.slots[this.oldest];
    this.slots[this.oldest] = item;
    this.oldest = (this.oldest + 1) % this.capacity;
    return displaced;
  }

  reduce<A>(fn: (acc: A, item: T) => A, initial: A): A {
    let acc = initial;
    for (let i = 0; i < this.slots.length; i++) {
      acc = fn(acc, this.slots[(this.oldest + i) % this.slots.length]);
    }
    return acc;
  }

  toArray(): T[] {
    return this.reduce<T[]>((items, item) => {
      items.push(item);
      return items;
    }, []);
  }

  get length(): number {
    return this.slots.length;
  }

  get isFull(): boolean {
    return this.slots.length === this.capacity;
  }
}
