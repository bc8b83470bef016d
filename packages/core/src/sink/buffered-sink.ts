/**
 * Buffered Entry Sink
 * Bounded in-process queue drained into a writer one entry at a time
 */

import { createChildLogger, SinkStoppedError, type Entry } from '@logbridge/shared';
import type { BufferedSinkConfig, EntrySink, EntryWriter } from './types.js';

const DEFAULT_CONFIG: BufferedSinkConfig = {
  capacity: 1024,
};

interface Waiter {
  resolve: () => void;
  reject: (error: Error) => void;
}

export class BufferedEntrySink implements EntrySink {
  private config: BufferedSinkConfig;
  private queue: Entry[] = [];
  private waiters: Waiter[] = [];
  private wakeDrain: (() => void) | null = null;
  private stopped = false;
  private writeFailures = 0;
  private readonly drainLoop: Promise<void>;
  private logger = createChildLogger({ component: 'BufferedEntrySink' });

  constructor(private readonly writer: EntryWriter, config: Partial<BufferedSinkConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.drainLoop = this.drain();
  }

  async submit(entry: Entry): Promise<void> {
    while (!this.stopped && this.queue.length >= this.config.capacity) {
      await new Promise<void>((resolve, reject) => {
        this.waiters.push({ resolve, reject });
      });
    }
    if (this.stopped) {
      throw new SinkStoppedError();
    }

    this.queue.push(entry);
    this.wakeDrain?.();
  }

  stop(): void {
    if (this.stopped) return;
    this.stopped = true;

    const waiters = this.waiters.splice(0);
    for (const waiter of waiters) {
      waiter.reject(new SinkStoppedError());
    }
    this.wakeDrain?.();
    this.logger.debug({ queued: this.queue.length }, 'Sink stopped');
  }

  /**
   * Resolves once stop() was called and every queued entry was written
   */
  drained(): Promise<void> {
    return this.drainLoop;
  }

  get size(): number {
    return this.queue.length;
  }

  get failures(): number {
    return this.writeFailures;
  }

  private async drain(): Promise<void> {
    for (;;) {
      const entry = this.queue.shift();
      if (entry === undefined) {
        if (this.stopped) return;
        await new Promise<void>((resolve) => {
          this.wakeDrain = resolve;
        });
        this.wakeDrain = null;
        continue;
      }

      // A slot opened up
      this.waiters.shift()?.resolve();

      try {
        await this.writer(entry);
      } catch (error) {
        this.writeFailures++;
        this.logger.error({ err: error }, 'Entry writer failed; entry discarded');
      }
    }
  }
}
