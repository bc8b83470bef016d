/**
 * Push routes
 * One POST endpoint receiving Pub/Sub push deliveries
 */

import type { FastifyPluginAsync, FastifyReply } from 'fastify';
import { createChildLogger, isRetryableError, TransportError, type Logger } from '@logbridge/shared';
import { translatePushBody, type TranslationOptions } from '../translation/index.js';
import type { FailureReason, TargetMetrics } from '../metrics/index.js';
import type { EntrySink } from '../sink/index.js';

export interface PushRoutesOptions {
  path: string;
  sink: EntrySink;
  metrics: TargetMetrics;
  translation: Omit<TranslationOptions, 'tenantId'>;
  logger?: Logger;
}

const TENANT_HEADER = 'x-scope-orgid';

export const pushRoutes: FastifyPluginAsync<PushRoutesOptions> = async (app, options) => {
  const logger = options.logger ?? createChildLogger({ component: 'PushRoutes' });

  const fail = (reply: FastifyReply, reason: FailureReason, error: Error) => {
    options.metrics.entryFailed(reason);
    logger.warn({ reason, err: error }, 'Failed to handle gcp push request');
    return reply.code(400).type('text/plain; charset=utf-8').send(error.message);
  };

  // Raw bytes for every content type; JSON is parsed in the handler
  app.removeAllContentTypeParsers();
  app.addContentTypeParser('*', { parseAs: 'buffer' }, (_request, body, done) => {
    done(null, body);
  });

  // Body read failures (aborted uploads, oversized bodies) land here
  app.setErrorHandler((error, _request, reply) => {
    return fail(
      reply,
      'transport',
      new TransportError(`failed to read push request: ${error.message}`, { fastifyCode: error.code })
    );
  });

  app.post(options.path, async (request, reply) => {
    const body = request.body;
    if (!Buffer.isBuffer(body) || body.length === 0) {
      return fail(reply, 'parse', new TransportError('request body is empty'));
    }

    let payload: unknown;
    try {
      payload = JSON.parse(body.toString('utf8'));
    } catch (error) {
      return fail(
        reply,
        'parse',
        new TransportError(`failed to parse push request: ${error instanceof Error ? error.message : String(error)}`)
      );
    }

    const tenantHeader = request.headers[TENANT_HEADER];
    const tenantId = typeof tenantHeader === 'string' && tenantHeader.length > 0 ? tenantHeader : undefined;

    const result = translatePushBody(payload, { ...options.translation, tenantId });
    if (!result.success) {
      return fail(reply, result.error.reason, result.error);
    }

    logger.debug({ line: result.entry.line }, 'Received line');

    // Not answered until the sink holds the entry
    try {
      await options.sink.submit(result.entry);
    } catch (error) {
      options.metrics.entryFailed('sink');
      logger.warn({ err: error }, 'Entry sink rejected push entry');
      // Pub/Sub retries both; 503 marks a sink that is shutting down
      return isRetryableError(error)
        ? reply.code(503).type('text/plain; charset=utf-8').send('entry sink is not accepting entries')
        : reply.code(500).type('text/plain; charset=utf-8').send('entry sink failed to accept entry');
    }

    options.metrics.entryAccepted();
    return reply.code(204).send();
  });
};
