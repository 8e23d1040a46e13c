import type { GestureLabel } from "./types";

/** Fixed-capacity FIFO; pushing onto a full buffer evicts the oldest entry. */
export class BoundedHistory<T> {
  private items: T[] = [];

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error(`History capacity must be a positive integer, got ${capacity}`);
    }
  }

  push(item: T): void {
    this.items.push(item);
    if (this.items.length > this.capacity) {
      this.items.shift();
    }
  }

  values(): readonly T[] {
    return [...this.items];
  }

  latest(): T | undefined {
    return this.items[this.items.length - 1];
  }

  get size(): number {
    return this.items.length;
  }

  clear(): void {
    this.items = [];
  }
}

export class GestureHistory extends BoundedHistory<GestureLabel> {
  countOf(label: GestureLabel): number {
    return this.values().filter((l) => l === label).length;
  }

  stability(label: GestureLabel): number {
    return this.size === 0 ? 0 : this.countOf(label) / this.size;
  }

  /** True once the buffer is full and every entry is `label`. */
  isSettled(label: GestureLabel): boolean {
    return this.size === this.capacity && this.countOf(label) === this.size;
  }
}
