/**
 * Push Target
 * HTTP server accepting Pub/Sub push deliveries
 */

import Fastify, { type FastifyInstance } from 'fastify';
import {
  createChildLogger,
  TARGET_TYPES,
  type LabelSet,
  type Logger,
  type TargetType,
} from '@logbridge/shared';
import { pushRoutes } from './push-routes.js';
import type { PushTargetConfig, Target, TargetDeps } from './types.js';

export class PushTarget implements Target {
  private readonly app: FastifyInstance;
  private address: string | null = null;
  private starting: Promise<void> | null = null;
  private stopping: Promise<void> | null = null;
  private logger: Logger;

  constructor(
    private readonly config: PushTargetConfig,
    private readonly deps: TargetDeps
  ) {
    this.logger = (deps.logger ?? createChildLogger({ component: 'PushTarget' })).child({
      job: config.jobName,
    });
    this.app = Fastify({
      logger: false, // We use our own logger
      bodyLimit: config.server.bodyLimit,
    });
  }

  /**
   * Register the push route and listen on the configured address
   */
  start(): Promise<void> {
    if (!this.starting) {
      this.starting = this.listen();
    }
    return this.starting;
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
   * Always ready; per-request failures are visible through the error counters
   */
  ready(): boolean {
    return true;
  }

  details(): Record<string, string> {
    const details: Record<string, string> = { path: this.config.server.path };
    if (this.address) {
      details.address = this.address;
    }
    return details;
  }

  stop(): Promise<void> {
    if (!this.stopping) {
      this.stopping = this.shutdown();
    }
    return this.stopping;
  }

  private async listen(): Promise<void> {
    this.logger.info({ path: this.config.server.path }, 'Starting gcp push target');

    await this.app.register(pushRoutes, {
      path: this.config.server.path,
      sink: this.deps.sink,
      metrics: this.deps.metrics,
      translation: {
        staticLabels: this.config.labels,
        useIncomingTimestamp: this.config.useIncomingTimestamp,
        relabelRules: this.config.relabelRules,
      },
      logger: this.logger,
    });

    this.address = await this.app.listen({
      host: this.config.server.host,
      port: this.config.server.port,
    });
    this.logger.info({ address: this.address }, 'Gcp push target listening');
  }

  private async shutdown(): Promise<void> {
    this.logger.info('Stopping gcp push target');
    // In-flight requests finish before close() resolves
    await this.app.close();
    this.deps.sink.stop();
  }
}
