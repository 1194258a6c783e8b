import { CancellationToken } from '../cancellation/CancellationToken';

/**
 * Bounded FIFO between `send()` and the sender loop.
 * Producers never wait: a full queue rejects instead. A single consumer awaits items.
 */
export class OutgoingQueue<T> {
  private items: T[] = [];
  private waiter?: (item: T | undefined) => void;

  constructor(private readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Queue capacity must be a positive integer, got ${capacity}`);
    }
  }

  get size(): number {
    return this.items.length;
  }

  get isFull(): boolean {
    return this.items.length >= this.capacity;
  }

  /**
   * Returns false when the queue is at capacity
   */
  tryEnqueue(item: T): boolean {
    if (this.waiter) {
      const waiter = this.waiter;
      this.waiter = undefined;
      waiter(item);
      return true;
    }

    if (this.isFull) {
      return false;
    }

    this.items.push(item);
    return true;
  }

  /**
   * Next item, or undefined once the token is cancelled
   */
  dequeue(token: CancellationToken): Promise<T | undefined> {
    if (this.items.length > 0) {
      return Promise.resolve(this.items.shift());
    }
    if (token.isCancellationRequested) {
      return Promise.resolve(undefined);
    }
    if (this.waiter) {
      return Promise.reject(new Error('OutgoingQueue supports a single consumer'));
    }

    return new Promise<T | undefined>((resolve) => {
      let unsubscribe: () => void = () => undefined;
      const waiter = (item: T | undefined): void => {
        unsubscribe();
        resolve(item);
      };
      this.waiter = waiter;

      unsubscribe = token.onCancellationRequested(() => {
        if (this.waiter === waiter) {
          this.waiter = undefined;
        }
        resolve(undefined);
      });
    });
  }

  /**
   * Drop queued items; a waiting consumer is released with undefined
   */
  clear(): number {
    const dropped = this.items.length;
    this.items = [];
    if (this.waiter) {
      const waiter = this.waiter;
      this.waiter = undefined;
      waiter(undefined);
    }
    return dropped;
  }
}
