/**
 * Fixed-capacity FIFO of prices. Pushing into a full window evicts the oldest.
 */
export class PriceWindow {
  private buffer: number[];
  private start = 0;
  private size = 0;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new RangeError(`Window capacity must be a positive integer, got ${capacity}`);
    }
    this.buffer = new Array<number>(capacity).fill(0);
  }

  get length(): number {
    return this.size;
  }

  isFull(): boolean {
    return this.size === this.capacity;
  }

  push(price: number): void {
    const idx = (this.start + this.size) % this.capacity;
    this.buffer[idx] = price;
    if (this.size < this.capacity) {
      this.size += 1;
    } else {
      this.start = (this.start + 1) % this.capacity;
    }
  }

  /** Replaces the contents with `capacity` copies of `price`. */
  fill(price: number): void {
    this.buffer.fill(price);
    this.start = 0;
    this.size = this.capacity;
  }

  clear(): void {
    this.start = 0;
    this.size = 0;
  }

  /** Oldest first. */
  values(): number[] {
    const out: number[] = [];
    for (let i = 0; i < this.size; i += 1) {
      out.push(this.buffer[(this.start + i) % this.capacity] ?? 0);
    }
    return out;
  }

  /** The most recent `count` prices, oldest first. */
  tail(count: number): number[] {
    const all = this.values();
    return count >= all.length ? all : all.slice(all.length - count);
  }

  latest(): number | null {
    if (this.size === 0) return null;
    return this.buffer[(this.start + this.size - 1) % this.capacity] ?? null;
  }
}
