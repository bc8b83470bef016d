/**
 * Target factory
 * Builds the variant a configuration asks for; callers only see Target
 */

import type { ClientConfig } from '@google-cloud/pubsub';
import { PubSubSubscriptionClient } from './pubsub-client.js';
import { PullTarget } from './pull-target.js';
import { PushTarget } from './push-target.js';
import type {
  PullTargetConfig,
  PushTargetConfig,
  SubscriptionClient,
  Target,
  TargetConfig,
  TargetDeps,
} from './types.js';

export interface CreateTargetOptions {
  /** Replaces the @google-cloud/pubsub client for pull targets */
  subscriptionClient?: SubscriptionClient;
  clientConfig?: ClientConfig;
}

export function newPullTarget(
  config: PullTargetConfig,
  deps: TargetDeps,
  options: CreateTargetOptions = {}
): PullTarget {
  const client =
    options.subscriptionClient ??
    new PubSubSubscriptionClient({
      projectId: config.projectId,
      subscription: config.subscription,
      maxOutstandingMessages: config.maxOutstandingMessages,
      clientConfig: options.clientConfig,
    });
  return new PullTarget(config, client, deps);
}

export async function newPushTarget(config: PushTargetConfig, deps: TargetDeps): Promise<PushTarget> {
  const target = new PushTarget(config, deps);
  try {
    await target.start();
  } catch (error) {
    await target.stop();
    throw error;
  }
  return target;
}

export async function createTarget(
  config: TargetConfig,
  deps: TargetDeps,
  options: CreateTargetOptions = {}
): Promise<Target> {
  switch (config.subscriptionType) {
    case 'pull':
      return newPullTarget(config, deps, options);
    case 'push':
      return newPushTarget(config, deps);
  }
}
