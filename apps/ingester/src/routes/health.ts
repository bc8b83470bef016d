/**
 * Health, readiness and metrics routes
 */
import type { FastifyInstance } from 'fastify';
import type { Registry } from 'prom-client';
import type { Target } from '@logbridge/core';

export interface HealthRoutesOptions {
  target: Target;
  registry: Registry;
}

export async function healthRoutes(app: FastifyInstance, options: HealthRoutesOptions): Promise<void> {
  const { target, registry } = options;

  app.get('/health', async () => {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
    };
  });

  app.get('/ready', async (_request, reply) => {
    const ready = target.ready();
    return reply.code(ready ? 200 : 503).send({
      ready,
      type: target.type(),
      labels: target.labels(),
      details: target.details(),
    });
  });

  app.get('/metrics', async (_request, reply) => {
    const body = await registry.metrics();
    return reply.type(registry.contentType).send(body);
  });
}
