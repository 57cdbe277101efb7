import type { NestFastifyApplication } from '@nestjs/platform-fastify';
import type { FastifyInstance } from 'fastify';
import { context as otelContext, trace as otelTrace } from '@opentelemetry/api';
import './fastify-request';
import { assignRequestId, type RequestIdCarrier } from './request-id';

function stripQueryString(url: string): string {
  const idx = url.indexOf('?');
  return idx === -1 ? url : url.slice(0, idx);
}

/**
 * Request-id correlation for every request, unmatched routes included. Query strings never reach
 * span attributes: admin lookups carry usernames and ips there.
 */
export function registerFastifyHttpPlatform(app: NestFastifyApplication) {
  const fastify: FastifyInstance = app.getHttpAdapter().getInstance();

  fastify.addHook('onRequest', async (req, reply) => {
    const requestId = assignRequestId(req);
    reply.header('X-Request-Id', requestId);

    // nestjs-pino serializes the raw IncomingMessage.
    const raw: RequestIdCarrier = req.raw;
    raw.requestId = requestId;
    raw.id = requestId;

    const span = otelTrace.getSpan(otelContext.active());
    if (span) {
      const path = stripQueryString(req.url);
      span.setAttribute('app.request_id', requestId);
      span.setAttribute('http.target', path);
      span.setAttribute('url.path', path);
    }
  });
}
