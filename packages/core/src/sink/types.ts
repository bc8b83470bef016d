/**
 * Sink Types
 */

import type { Entry } from '@logbridge/shared';

/**
 * Downstream consumer of translated entries
 */
export interface EntrySink {
  /**
   * Hand over one entry. Resolves once the sink holds it; may wait under
   * backpressure. Rejects with SinkStoppedError after stop().
   */
  submit(entry: Entry): Promise<void>;
  /** Idempotent */
  stop(): void;
}

export type EntryWriter = (entry: Entry) => Promise<void> | void;

export interface BufferedSinkConfig {
  capacity: number;
}
