/**
 * Pub/Sub subscription client backed by @google-cloud/pubsub
 */

import { PubSub, type ClientConfig, type Message } from '@google-cloud/pubsub';
import { createChildLogger, SubscriptionError, wrapError } from '@logbridge/shared';
import type { DeliverFn, ReceivedMessage, SubscriptionClient } from './types.js';

export interface PubSubClientOptions {
  projectId: string;
  subscription: string;
  /** Flow control: messages leased but not yet acked */
  maxOutstandingMessages: number;
  clientConfig?: ClientConfig;
}

export class PubSubSubscriptionClient implements SubscriptionClient {
  private readonly pubsub: PubSub;
  private readonly subscriptionName: string;
  private logger = createChildLogger({ component: 'PubSubSubscriptionClient' });

  constructor(private readonly options: PubSubClientOptions) {
    this.pubsub = new PubSub({ ...options.clientConfig, projectId: options.projectId });
    this.subscriptionName = `projects/${options.projectId}/subscriptions/${options.subscription}`;
  }

  receive(signal: AbortSignal, deliver: DeliverFn): Promise<void> {
    if (signal.aborted) {
      return Promise.resolve();
    }

    const subscription = this.pubsub.subscription(this.subscriptionName, {
      flowControl: {
        maxMessages: this.options.maxOutstandingMessages,
        allowExcessMessages: false,
      },
    });

    return new Promise<void>((resolve, reject) => {
      let settled = false;

      const finish = (failure?: SubscriptionError) => {
        if (settled) return;
        settled = true;
        signal.removeEventListener('abort', onAbort);
        subscription.removeListener('message', onMessage);
        subscription.removeListener('error', onError);
        subscription.removeListener('close', onClose);

        subscription.close().then(
          () => (failure ? reject(failure) : resolve()),
          (closeError: unknown) => reject(failure ?? new SubscriptionError(wrapError(closeError).message))
        );
      };

      const onMessage = (message: Message) => {
        deliver(this.toReceivedMessage(message)).catch((error: unknown) => {
          // Never handed to the consumer; let Pub/Sub redeliver it
          message.nack();
          this.logger.debug({ err: error, messageId: message.id }, 'Message returned to subscription');
        });
      };
      const onError = (error: Error) => {
        finish(new SubscriptionError(error.message, { subscription: this.subscriptionName }));
      };
      const onClose = () => finish();
      const onAbort = () => finish();

      subscription.on('message', onMessage);
      subscription.on('error', onError);
      subscription.on('close', onClose);
      signal.addEventListener('abort', onAbort, { once: true });

      this.logger.info({ subscription: this.subscriptionName }, 'Receiving pubsub messages');
    });
  }

  async close(): Promise<void> {
    await this.pubsub.close();
  }

  private toReceivedMessage(message: Message): ReceivedMessage {
    return {
      id: message.id,
      data: message.data,
      attributes: message.attributes ?? {},
      publishTime: message.publishTime,
      subscription: this.subscriptionName,
      ack: () => message.ack(),
      nack: () => message.nack(),
    };
  }
}
