/**
 * Bounded async FIFO with a single consumer in mind. `push` suspends while
 * the queue is at capacity; `pull` suspends while it is empty and resolves
 * null once the queue is closed and drained.
 */
export class BoundedQueue<T> {
  private items: T[] = [];
  private pullers: Array<(item: T | null) => void> = [];
  private pushers: Array<() => void> = [];
  private closed = false;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Queue capacity must be a positive integer, got ${capacity}`);
    }
  }

  async push(item: T): Promise<void> {
    while (!this.closed && this.items.length >= this.capacity) {
      await new Promise<void>((resolve) => this.pushers.push(resolve));
    }
    if (this.closed) throw new Error('Queue is closed');

    const puller = this.pullers.shift();
    if (puller) {
      puller(item);
    } else {
      this.items.push(item);
    }
  }

  pull(): Promise<T | null> {
    if (this.items.length > 0) {
      const item = this.items.shift();
      this.pushers.shift()?.();
      return Promise.resolve(item ?? null);
    }
    if (this.closed) return Promise.resolve(null);
    return new Promise((resolve) => this.pullers.push(resolve));
  }

  /** Refuse new items; queued items stay available to pull. */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const puller of this.pullers.splice(0)) puller(null);
    for (const pusher of this.pushers.splice(0)) pusher();
  }

  get size(): number {
    return this.items.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }
}
