/**
 * Zero-buffer handoff between one producer side and one consumer
 * put() settles only once a consumer has taken the item.
 */

export class HandoffCancelledError extends Error {
  constructor() {
    super('Handoff cancelled');
    this.name = 'HandoffCancelledError';
  }
}

interface PendingPut<T> {
  item: T;
  resolve: () => void;
  reject: (error: Error) => void;
}

export class Handoff<T> {
  private puts: PendingPut<T>[] = [];
  private taker: ((item: T | undefined) => void) | null = null;

  put(item: T, signal: AbortSignal): Promise<void> {
    if (signal.aborted) {
      return Promise.reject(new HandoffCancelledError());
    }

    if (this.taker) {
      const taker = this.taker;
      this.taker = null;
      taker(item);
      return Promise.resolve();
    }

    return new Promise<void>((resolve, reject) => {
      const pending: PendingPut<T> = {
        item,
        resolve: () => {
          signal.removeEventListener('abort', onAbort);
          resolve();
        },
        reject,
      };
      const onAbort = () => {
        const index = this.puts.indexOf(pending);
        if (index >= 0) {
          this.puts.splice(index, 1);
          reject(new HandoffCancelledError());
        }
      };
      signal.addEventListener('abort', onAbort, { once: true });
      this.puts.push(pending);
    });
  }

  /**
   * Next item, or undefined once the signal has aborted
   */
  take(signal: AbortSignal): Promise<T | undefined> {
    if (signal.aborted) {
      return Promise.resolve(undefined);
    }

    const pending = this.puts.shift();
    if (pending) {
      pending.resolve();
      return Promise.resolve(pending.item);
    }

    if (this.taker) {
      return Promise.reject(new Error('Handoff already has a consumer waiting'));
    }

    return new Promise<T | undefined>((resolve) => {
      const onAbort = () => {
        if (this.taker === settle) this.taker = null;
        resolve(undefined);
      };
      const settle = (item: T | undefined) => {
        signal.removeEventListener('abort', onAbort);
        resolve(item);
      };
      this.taker = settle;
      signal.addEventListener('abort', onAbort, { once: true });
    });
  }

  /** Producers currently blocked in put() */
  get waitingProducers(): number {
    return this.puts.length;
  }
}
