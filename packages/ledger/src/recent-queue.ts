/**
 * Bounded most-recent-first id queue.
 *
 * push() puts an id at the front; once the queue exceeds its capacity the
 * oldest ids are trimmed from the tail.
 */
export class RecentQueue {
  private readonly _items: number[] = [];

  constructor(private readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Queue capacity must be a positive integer, got ${capacity}`);
    }
  }

  push(id: number): void {
    this._items.unshift(id);
    if (this._items.length > this.capacity) {
      this._items.length = this.capacity;
    }
  }

  /** Newest first. */
  toArray(): readonly number[] {
    return [...this._items];
  }

  get size(): number {
    return this._items.length;
  }
}
