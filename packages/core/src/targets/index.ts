/**
 * Targets
 * Push and pull ingestion behind one facade
 */

export * from './types.js';
export { Handoff, HandoffCancelledError } from './handoff.js';
export { PullTarget } from './pull-target.js';
export { PushTarget } from './push-target.js';
export { pushRoutes } from './push-routes.js';
export type { PushRoutesOptions } from './push-routes.js';
export { PubSubSubscriptionClient } from './pubsub-client.js';
export type { PubSubClientOptions } from './pubsub-client.js';
export { createTarget, newPullTarget, newPushTarget } from './factory.js';
export type { CreateTargetOptions } from './factory.js';
