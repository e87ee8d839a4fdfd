import { ChannelError } from './errors.js';

/**
 * FIFO queue with O(1) amortised dequeue. Consumed slots are dropped in one
 * splice once they make up half the backing array.
 */
export class Fifo<T> {
  private items: T[] = [];
  private head = 0;

  get length(): number {
    return this.items.length - this.head;
  }

  push(item: T): void {
    this.items.push(item);
  }

  shift(): T | undefined {
    if (this.head >= this.items.length) return undefined;
    const item = this.items[this.head];
    this.head++;
    if (this.head * 2 >= this.items.length) {
      this.items.splice(0, this.head);
      this.head = 0;
    }
    return item;
  }

  /** Remove and return everything still queued. */
  drain(): T[] {
    const rest = this.items.slice(this.head);
    this.items = [];
    this.head = 0;
    return rest;
  }
}

interface Waiter<T> {
  resolve: (value: T) => void;
  reject: (error: Error) => void;
}

/**
 * Unbounded multi-producer / single-consumer channel.
 *
 * Any number of callbacks may `send`; one consumer awaits `receive`.
 * Values are delivered in send order. `undefined` and `null` are not valid
 * payloads, so an empty buffer is told apart without a separate check.
 */
export class Channel<T extends NonNullable<unknown>> {
  private buffer = new Fifo<T>();
  private waiters = new Fifo<Waiter<T>>();
  private closed = false;

  get size(): number {
    return this.buffer.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  send(value: T): void {
    if (this.closed) {
      throw new ChannelError('Send on a closed channel');
    }
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.resolve(value);
    } else {
      this.buffer.push(value);
    }
  }

  receive(): Promise<T> {
    const buffered = this.buffer.shift();
    if (buffered !== undefined) {
      return Promise.resolve(buffered);
    }
    if (this.closed) {
      return Promise.reject(new ChannelError('Receive on a closed, empty channel'));
    }
    return new Promise((resolve, reject) => {
      this.waiters.push({ resolve, reject });
    });
  }

  /** Stop accepting values. Buffered values stay receivable. */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const waiter of this.waiters.drain()) {
      waiter.reject(new ChannelError('Channel closed while waiting to receive'));
    }
  }
}
