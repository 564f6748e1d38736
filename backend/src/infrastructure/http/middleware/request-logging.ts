/**
 * Request/response logging hooks
 */

import type { FastifyInstance } from 'fastify';
import { createLogger } from '../../logging/logger.js';

const logger = createLogger('http');

export const SLOW_REQUEST_THRESHOLD_MS = 1000;

export function registerRequestLogging(server: FastifyInstance): void {
  server.addHook('onRequest', async (request) => {
    logger.debug({
      method: request.method,
      url: request.url,
      remoteAddress: request.ip,
      userAgent: request.headers['user-agent'],
      requestId: request.id,
    }, 'Request started');
  });

  server.addHook('onResponse', async (request, reply) => {
    const context = {
      method: request.method,
      url: request.url,
      statusCode: reply.statusCode,
      responseTime: reply.elapsedTime,
      requestId: request.id,
    };

    logger.info(context, 'Request completed');

    if (reply.elapsedTime > SLOW_REQUEST_THRESHOLD_MS) {
      logger.warn(context, 'Slow request detected');
    }

    if (reply.statusCode >= 500) {
      logger.error(context, 'Request failed');
    } else if (reply.statusCode >= 400) {
      logger.warn(context, 'Request failed');
    }
  });
}
