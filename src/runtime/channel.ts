/**
 * Bounded, single-consumer channel on top of promises.
 *
 * Values are delivered in the order `send` was called. A full channel drops
 * the value (`send` returns false) instead of blocking the sender, which is
 * how signal delivery behaves when nobody has drained the previous one yet.
 * Closing is idempotent; once closed and drained, receivers get `closed`.
 */
export type Received<T> =
  | { readonly kind: 'value'; readonly value: T }
  | { readonly kind: 'closed' };

export class Channel<T> {
  private readonly buffer: Array<{ readonly value: T }> = [];
  private readonly waiters: Array<(received: Received<T>) => void> = [];
  private _closed = false;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Channel capacity must be a positive integer, got ${capacity}`);
    }
  }

  get closed(): boolean {
    return this._closed;
  }

  get size(): number {
    return this.buffer.length;
  }

  send(value: T): boolean {
    if (this._closed) return false;

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter({ kind: 'value', value });
      return true;
    }

    if (this.buffer.length >= this.capacity) return false;
    this.buffer.push({ value });
    return true;
  }

  receive(): Promise<Received<T>> {
    const slot = this.buffer.shift();
    if (slot) {
      return Promise.resolve({ kind: 'value', value: slot.value });
    }
    if (this._closed) {
      return Promise.resolve({ kind: 'closed' });
    }
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  close(): void {
    if (this._closed) return;
    this._closed = true;
    for (const waiter of this.waiters.splice(0)) {
      waiter({ kind: 'closed' });
    }
  }
}
