/**
 * logbridge ingester
 * Runs one Pub/Sub ingestion target into a buffered sink
 */

import Fastify from 'fastify';
import { collectDefaultMetrics, Registry } from 'prom-client';
import { createChildLogger, getConfig, validateConfig } from '@logbridge/shared';
import { BufferedEntrySink, createTarget, PromTargetMetrics } from '@logbridge/core';
import { healthRoutes } from './routes/health.js';
import { buildTargetConfig, loadRelabelRules } from './target-config.js';

const logger = createChildLogger({ component: 'Ingester' });

async function main() {
  const validation = validateConfig();
  if (!validation.valid) {
    logger.error({ errors: validation.errors }, 'Invalid configuration');
    process.exit(1);
  }
  const config = getConfig();

  const relabelRules = await loadRelabelRules(config.target.relabelConfigPath);
  const targetConfig = buildTargetConfig(config, relabelRules);

  const registry = new Registry();
  collectDefaultMetrics({ register: registry });

  const entryLogger = createChildLogger({ component: 'EntryWriter' });
  const sink = new BufferedEntrySink(
    (entry) => {
      entryLogger.info(
        { labels: entry.labels, entryTimestamp: entry.timestamp.toISOString() },
        entry.line
      );
    },
    { capacity: config.sink.queueCapacity }
  );

  const target = await createTarget(targetConfig, {
    sink,
    metrics: new PromTargetMetrics(registry, {
      job: targetConfig.jobName,
      projectId: targetConfig.projectId,
      subscription: targetConfig.subscriptionType === 'pull' ? targetConfig.subscription : '',
    }),
  });
  logger.info({ type: target.type(), details: target.details() }, 'Ingestion target started');

  const app = Fastify({
    logger: false, // We use our own logger
  });
  await app.register(healthRoutes, { target, registry });

  // Graceful shutdown
  const shutdown = async (signal: string) => {
    logger.info(`Received ${signal}, shutting down...`);
    try {
      await app.close();
      await target.stop();
      await sink.drained();
    } catch (error) {
      logger.error({ err: error }, 'Error during shutdown');
      process.exit(1);
    }
    process.exit(0);
  };

  process.on('SIGINT', () => {
    shutdown('SIGINT').catch(() => process.exit(1));
  });
  process.on('SIGTERM', () => {
    shutdown('SIGTERM').catch(() => process.exit(1));
  });

  try {
    await app.listen({
      port: config.server.port,
      host: config.server.host,
    });
    logger.info(`Metrics server started on ${config.server.host}:${config.server.port}`);
  } catch (error) {
    logger.error({ err: error }, 'Failed to start metrics server');
    await target.stop();
    process.exit(1);
  }
}

main().catch((error) => {
  logger.error({ err: error }, 'Fatal error');
  process.exit(1);
});
