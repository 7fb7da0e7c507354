/**
 * Fixed-capacity ring buffer; the oldest item is overwritten once full.
 */
export class Ring<T> {
  private readonly slots: (T | undefined)[];
  private next = 0;
  private count = 0;

  constructor(public readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Ring capacity must be a positive integer, got ${capacity}`);
    }
    this.slots = new Array<T | undefined>(capacity).fill(undefined);
  }

  get size(): number {
    return this.count;
  }

  push(item: T): void {
    this.slots[this.next] = item;
    this.next = (this.next + 1) % this.capacity;
    this.count = Math.min(this.count + 1, this.capacity);
  }

  /** Most recent item, or undefined when empty */
  latest(): T | undefined {
    if (this.count === 0) return undefined;
    return this.slots[(this.next - 1 + this.capacity) % this.capacity];
  }

  /** Items oldest first */
  toArray(): T[] {
    const out: T[] = [];
    const start = (this.next - this.count + this.capacity) % this.capacity;
    for (let i = 0; i < this.count; i++) {
      const item = this.slots[(start + i) % this.capacity];
      if (item !== undefined) out.push(item);
    }
    return out;
  }
}
