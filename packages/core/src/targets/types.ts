/**
 * Target Types
 * The facade every ingestion source exposes, and the configuration behind it
 */

import type { LabelSet, Logger, PullTargetState, RelabelRule, TargetType } from '@logbridge/shared';
import type { EntrySink } from '../sink/index.js';
import type { TargetMetrics } from '../metrics/index.js';
import type { MessageEnvelope } from '../translation/index.js';

export interface Target {
  type(): TargetType;
  labels(): LabelSet;
  /** Neither mode performs service discovery */
  discoveredLabels(): LabelSet;
  ready(): boolean;
  details(): Record<string, string>;
  /** Idempotent; resolves once background work has quiesced */
  stop(): Promise<void>;
}

interface BaseTargetConfig {
  jobName: string;
  projectId: string;
  labels: LabelSet;
  useIncomingTimestamp: boolean;
  relabelRules: readonly RelabelRule[];
}

export interface PullTargetConfig extends BaseTargetConfig {
  subscriptionType: 'pull';
  subscription: string;
  maxOutstandingMessages: number;
}

export interface PushServerConfig {
  host: string;
  port: number;
  path: string;
  bodyLimit: number;
}

export interface PushTargetConfig extends BaseTargetConfig {
  subscriptionType: 'push';
  server: PushServerConfig;
}

export type TargetConfig = PullTargetConfig | PushTargetConfig;

export interface TargetDeps {
  sink: EntrySink;
  metrics: TargetMetrics;
  logger?: Logger;
}

// ===========================================
// Pull mode
// ===========================================

/**
 * A delivered message plus its acknowledgment capability
 */
export interface ReceivedMessage extends MessageEnvelope {
  ack(): void;
  /** Ask for redelivery; used for handles the consumer never accepted */
  nack(): void;
}

export type DeliverFn = (message: ReceivedMessage) => Promise<void>;

export interface SubscriptionClient {
  /**
   * Receive until the signal aborts (resolves) or the subscription fails
   * (rejects). `deliver` may be invoked concurrently.
   */
  receive(signal: AbortSignal, deliver: DeliverFn): Promise<void>;
  /** Release client resources */
  close(): Promise<void>;
}

export interface PullTargetEvents {
  'state:changed': { from: PullTargetState; to: PullTargetState; reason: string };
  'entry:submitted': { messageId: string };
  'entry:failed': { messageId: string; reason: string };
}
