import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import Fastify, { type FastifyInstance } from 'fastify';
import { Counter, Registry } from 'prom-client';
import type { Target } from '@logbridge/core';
import { healthRoutes } from './health.js';

function fakeTarget(ready: boolean): Target {
  return {
    type: () => 'gcplog',
    labels: () => ({ job: 'gcp' }),
    discoveredLabels: () => ({}),
    ready: () => ready,
    details: () => ({ project_id: 'test-project', subscription: 'test-sub', state: 'RUNNING' }),
    stop: async () => undefined,
  };
}

describe('healthRoutes', () => {
  let app: FastifyInstance;
  let registry: Registry;

  async function build(target: Target): Promise<FastifyInstance> {
    const instance = Fastify();
    await instance.register(healthRoutes, { target, registry });
    await instance.ready();
    return instance;
  }

  beforeEach(() => {
    registry = new Registry();
  });

  afterEach(async () => {
    await app.close();
  });

  it('should report liveness', async () => {
    app = await build(fakeTarget(true));

    const response = await app.inject({ method: 'GET', url: '/health' });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toMatchObject({ status: 'ok' });
  });

  it('should describe a ready target', async () => {
    app = await build(fakeTarget(true));

    const response = await app.inject({ method: 'GET', url: '/ready' });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({
      ready: true,
      type: 'gcplog',
      labels: { job: 'gcp' },
      details: { project_id: 'test-project', subscription: 'test-sub', state: 'RUNNING' },
    });
  });

  it('should answer 503 while the target is not ready', async () => {
    app = await build(fakeTarget(false));

    const response = await app.inject({ method: 'GET', url: '/ready' });

    expect(response.statusCode).toBe(503);
  });

  it('should expose the registry in text format', async () => {
    const counter = new Counter({ name: 'test_entries_total', help: 'Test counter', registers: [registry] });
    counter.inc();
    app = await build(fakeTarget(true));

    const response = await app.inject({ method: 'GET', url: '/metrics' });

    expect(response.statusCode).toBe(200);
    expect(response.body).toContain('test_entries_total 1');
  });
});
