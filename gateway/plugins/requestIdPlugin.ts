/**
 * Plugin Fastify para rastreamento de requisicoes.
 * - Gera ou reaproveita X-Request-Id
 * - Devolve o requestId no header de resposta
 * - Loga uma linha estruturada por requisicao concluida
 */

import { FastifyPluginAsync, FastifyRequest, FastifyReply } from 'fastify';
import fp from 'fastify-plugin';
import * as crypto from 'crypto';

declare module 'fastify' {
  interface FastifyRequest {
    requestId: string;
    requestStartTime: number;
  }
}

export interface RequestIdPluginOptions {
  /**
   * Se true, loga cada requisicao concluida
   * Default: true
   */
  logMetrics?: boolean;
}

const MAX_REQUEST_ID = 64;

/**
 * Usa o X-Request-Id do cliente (so alfanumericos, hifen e underscore) ou gera um UUID.
 */
function extractOrGenerateRequestId(request: FastifyRequest): string {
  const headerValue = request.headers['x-request-id'];

  if (typeof headerValue === 'string') {
    const sanitized = headerValue.replace(/[^a-zA-Z0-9\-_]/g, '').slice(0, MAX_REQUEST_ID);
    if (sanitized.length > 0) {
      return sanitized;
    }
  }

  return crypto.randomUUID();
}

const requestIdPluginImpl: FastifyPluginAsync<RequestIdPluginOptions> = async (app, opts) => {
  const logMetrics = opts.logMetrics !== false;

  app.decorateRequest('requestId', '');
  app.decorateRequest('requestStartTime', 0);

  app.addHook('onRequest', async (request: FastifyRequest, reply: FastifyReply) => {
    request.requestStartTime = Date.now();
    request.requestId = extractOrGenerateRequestId(request);
    reply.header('X-Request-Id', request.requestId);
  });

  if (logMetrics) {
    app.addHook('onResponse', async (request: FastifyRequest, reply: FastifyReply) => {
      request.log.info(
        {
          requestId: request.requestId,
          method: request.method,
          route: request.routeOptions.url ?? request.url,
          statusCode: reply.statusCode,
          latencyMs: Date.now() - request.requestStartTime
        },
        'request completed'
      );
    });
  }
};

export const requestIdPlugin = fp(requestIdPluginImpl, {
  name: 'request-id-plugin',
  fastify: '5.x'
});
