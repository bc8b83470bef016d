/**
 * Pull Target
 * Holds a subscription open and feeds its messages, one at a time, into the sink
 */

import { EventEmitter } from 'eventemitter3';
import {
  createChildLogger,
  logStateTransition,
  PULL_TARGET_STATES,
  SubscriptionError,
  TARGET_TYPES,
  wrapError,
  type LabelSet,
  type Logger,
  type PullTargetState,
  type TargetType,
} from '@logbridge/shared';
import { translateMessage, type TranslationOptions } from '../translation/index.js';
import { Handoff } from './handoff.js';
import { transitionValidator } from './pull-transitions.js';
import type {
  PullTargetConfig,
  PullTargetEvents,
  ReceivedMessage,
  SubscriptionClient,
  Target,
  TargetDeps,
} from './types.js';

export class PullTarget extends EventEmitter<PullTargetEvents> implements Target {
  private currentState: PullTargetState = PULL_TARGET_STATES.CREATED;
  private readonly controller = new AbortController();
  private readonly handoff = new Handoff<ReceivedMessage>();
  private readonly translation: TranslationOptions;
  private readonly consuming: Promise<void>;
  private readonly receiving: Promise<void>;
  private stopping: Promise<void> | null = null;
  private logger: Logger;

  /**
   * Starts the receive and consumer loops; stop() ends them
   */
  constructor(
    private readonly config: PullTargetConfig,
    private readonly client: SubscriptionClient,
    private readonly deps: TargetDeps
  ) {
    super();
    this.logger = (deps.logger ?? createChildLogger({ component: 'PullTarget' })).child({
      job: config.jobName,
      projectId: config.projectId,
      subscription: config.subscription,
    });
    this.translation = {
      staticLabels: config.labels,
      useIncomingTimestamp: config.useIncomingTimestamp,
      relabelRules: config.relabelRules,
    };

    this.consuming = this.consume();
    this.receiving = this.receive();
    if (this.currentState === PULL_TARGET_STATES.CREATED) {
      this.transition(PULL_TARGET_STATES.RUNNING, 'receive and consumer loops started');
    }
  }

  getState(): PullTargetState {
    return this.currentState;
  }

  type(): TargetType {
    return TARGET_TYPES.GCPLOG;
  }

  labels(): LabelSet {
    return this.config.labels;
  }

  discoveredLabels(): LabelSet {
    return {};
  }

  /**
   * Always ready: transient receive errors must not fail health checks.
   * Failures show up in the error counters instead.
   */
  ready(): boolean {
    return true;
  }

  details(): Record<string, string> {
    return {
      project_id: this.config.projectId,
      subscription: this.config.subscription,
      state: this.currentState,
    };
  }

  stop(): Promise<void> {
    if (!this.stopping) {
      this.stopping = this.shutdown();
    }
    return this.stopping;
  }

  /**
   * Resolves once the receive loop has returned and the client is closed
   */
  receiveEnded(): Promise<void> {
    return this.receiving;
  }

  private async shutdown(): Promise<void> {
    this.logger.info('Stopping pull target');
    this.cancel('stop requested');
    await this.consuming;
    this.deps.sink.stop();
    this.transition(PULL_TARGET_STATES.STOPPED, 'consumer drained and sink stopped');
  }

  private cancel(reason: string): void {
    if (this.controller.signal.aborted) return;
    this.controller.abort();
    this.transition(PULL_TARGET_STATES.CANCELLING, reason);
  }

  private async receive(): Promise<void> {
    const { signal } = this.controller;
    try {
      await this.client.receive(signal, (message) => this.handoff.put(message, signal));
      if (!signal.aborted) {
        this.logger.warn('Subscription receive loop ended');
      }
    } catch (error) {
      if (signal.aborted) {
        this.logger.debug({ err: error }, 'Receive loop failed while cancelling');
      } else {
        const err = error instanceof SubscriptionError ? error : new SubscriptionError(wrapError(error).message);
        this.logger.error({ err }, 'Failed to receive pubsub messages');
        this.deps.metrics.subscriptionFailed();
      }
    } finally {
      this.cancel('subscription receive loop ended');
      try {
        await this.client.close();
      } catch (error) {
        this.logger.warn({ err: error }, 'Failed to close subscription client');
      }
    }
  }

  private async consume(): Promise<void> {
    const { signal } = this.controller;
    for (;;) {
      const message = await this.handoff.take(signal);
      if (message === undefined) return;
      await this.handle(message);
    }
  }

  /**
   * Settles every handle exactly once. Anything thrown while handling is
   * logged and the loop carries on; an unsettled handle is then treated as
   * untranslatable.
   */
  private async handle(message: ReceivedMessage): Promise<void> {
    let settled = false;
    const settle = (outcome: 'ack' | 'nack') => {
      if (settled) return;
      settled = true;
      if (outcome === 'ack') {
        message.ack();
      } else {
        message.nack();
      }
    };

    try {
      await this.process(message, settle);
    } catch (error) {
      this.logger.error({ err: error, messageId: message.id }, 'Failed to handle pubsub message');
      if (!settled) {
        try {
          this.deps.metrics.entryFailed('malformed');
          settle('ack');
        } catch (settleError) {
          this.logger.error({ err: settleError, messageId: message.id }, 'Failed to settle pubsub message');
        }
      }
    }
  }

  /**
   * Ack follows submission; an untranslatable message is acked too so it is
   * not redelivered forever.
   */
  private async process(message: ReceivedMessage, settle: (outcome: 'ack' | 'nack') => void): Promise<void> {
    const result = translateMessage(message, this.translation);
    if (!result.success) {
      this.logger.warn(
        { err: result.error, messageId: message.id, reason: result.error.reason },
        'Error formatting log entry'
      );
      this.deps.metrics.entryFailed(result.error.reason);
      settle('ack');
      this.emit('entry:failed', { messageId: message.id, reason: result.error.reason });
      return;
    }

    try {
      await this.deps.sink.submit(result.entry);
    } catch (error) {
      this.logger.error({ err: error, messageId: message.id }, 'Failed to submit entry; requesting redelivery');
      this.deps.metrics.entryFailed('sink');
      settle('nack');
      this.emit('entry:failed', { messageId: message.id, reason: 'sink' });
      return;
    }

    settle('ack');
    this.deps.metrics.entryAccepted();
    this.emit('entry:submitted', { messageId: message.id });
  }

  private transition(to: PullTargetState, reason: string): void {
    const from = this.currentState;
    transitionValidator.validateTransition(from, to);
    this.currentState = to;
    logStateTransition(this.logger, from, to, reason);
    this.emit('state:changed', { from, to, reason });
  }
}
