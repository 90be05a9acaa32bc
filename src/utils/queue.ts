import Logger from '../logger/Logger';

/**
 * Unbounded FIFO channel: any number of producers push, exactly one consumer
 * pulls with `next()` or `for await`. Items come out in push order.
 */
export class EventChannel<T> {
  private queue: T[] = [];
  private waiting: ((result: IteratorResult<T, undefined>) => void) | null = null;
  private consumed = false;
  private closed = false;
  private pushed = 0;

  constructor(private readonly name = 'events') {}

  push(item: T): boolean {
    if (this.closed) {
      Logger.warn('Channel closed - item dropped', { channel: this.name });
      return false;
    }
    this.pushed++;
    if (this.waiting) {
      const resolve = this.waiting;
      this.waiting = null;
      resolve({ value: item, done: false });
    } else {
      this.queue.push(item);
    }
    return true;
  }

  /** Resolves with the next item, or done once the channel is closed and empty. */
  next(): Promise<IteratorResult<T, undefined>> {
    if (this.waiting) {
      return Promise.reject(new Error(`Channel ${this.name} already has a waiting consumer`));
    }
    const item = this.queue.shift();
    if (item !== undefined) {
      return Promise.resolve({ value: item, done: false });
    }
    if (this.closed) {
      return Promise.resolve({ value: undefined, done: true });
    }
    return new Promise((resolve) => {
      this.waiting = resolve;
    });
  }

  /**
   * Stops accepting items. Items already queued are still delivered, then the
   * consumer sees the end of the stream.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    Logger.info('Channel closed', { channel: this.name, pending: this.queue.length, pushed: this.pushed });
    if (this.waiting && this.queue.length === 0) {
      const resolve = this.waiting;
      this.waiting = null;
      resolve({ value: undefined, done: true });
    }
  }

  [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
    if (this.consumed) {
      throw new Error(`Channel ${this.name} supports a single consumer`);
    }
    this.consumed = true;
    return { next: () => this.next() };
  }

  getQueueDepth(): number {
    return this.queue.length;
  }

  isClosed(): boolean {
    return this.closed;
  }
}
