/**
 * Bounded FIFO queue with async producers and consumers.
 * A full queue makes `put` wait until a consumer frees a slot.
 */

export interface BoundedQueue<T> {
  /** Enqueue, waiting for room when full. Resolves false if the queue closes first. */
  put(item: T): Promise<boolean>;
  /** Dequeue the oldest item, or resolve undefined after `timeoutMs` or on close. */
  take(timeoutMs: number): Promise<T | undefined>;
  /** Close the queue, wake every waiter, and return the items that were never taken. */
  close(): T[];
  readonly size: number;
  readonly capacity: number;
  readonly closed: boolean;
}

interface WaitingTaker<T> {
  resolve: (item: T | undefined) => void;
  timeoutId: NodeJS.Timeout;
}

interface WaitingPutter<T> {
  item: T;
  resolve: (accepted: boolean) => void;
}

export function createBoundedQueue<T>(capacity: number): BoundedQueue<T> {
  if (!Number.isInteger(capacity) || capacity < 1) {
    throw new RangeError(`Queue capacity must be a positive integer, got ${String(capacity)}`);
  }

  const items: T[] = [];
  const takers: WaitingTaker<T>[] = [];
  const putters: WaitingPutter<T>[] = [];
  let closed = false;

  /** Move the oldest blocked producer's item into the freed slot. */
  function admitWaitingPutter(): void {
    const putter = putters.shift();
    if (putter) {
      items.push(putter.item);
      putter.resolve(true);
    }
  }

  return {
    put(item: T): Promise<boolean> {
      if (closed) return Promise.resolve(false);

      const taker = takers.shift();
      if (taker) {
        clearTimeout(taker.timeoutId);
        taker.resolve(item);
        return Promise.resolve(true);
      }

      if (items.length < capacity) {
        items.push(item);
        return Promise.resolve(true);
      }

      return new Promise((resolve) => {
        putters.push({ item, resolve });
      });
    },

    take(timeoutMs: number): Promise<T | undefined> {
      if (items.length > 0) {
        const item = items.shift();
        admitWaitingPutter();
        return Promise.resolve(item);
      }
      if (closed) return Promise.resolve(undefined);

      return new Promise((resolve) => {
        const waiter: WaitingTaker<T> = {
          resolve,
          timeoutId: setTimeout(() => {
            const index = takers.indexOf(waiter);
            if (index !== -1) takers.splice(index, 1);
            resolve(undefined);
          }, timeoutMs),
        };
        takers.push(waiter);
      });
    },

    close(): T[] {
      if (closed) return [];
      closed = true;

      for (const taker of takers.splice(0)) {
        clearTimeout(taker.timeoutId);
        taker.resolve(undefined);
      }

      const dropped = items.splice(0);
      for (const putter of putters.splice(0)) {
        dropped.push(putter.item);
        putter.resolve(false);
      }
      return dropped;
    },

    get size(): number {
      return items.length;
    },

    get capacity(): number {
      return capacity;
    },

    get closed(): boolean {
      return closed;
    },
  };
}
