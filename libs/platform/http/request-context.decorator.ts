import { createParamDecorator, type ExecutionContext } from '@nestjs/common';
import type { FastifyRequest } from 'fastify';
import './fastify-request';
import { assignRequestId } from './request-id';

export type ClientContextValue = Readonly<{
  ip: string;
  userAgent?: string;
  requestId: string;
}>;

function firstHeaderValue(value: unknown): unknown {
  return Array.isArray(value) ? value[0] : value;
}

/** Raw header value; length limits belong to whoever stores it. */
export function readUserAgentHeader(value: unknown): string | undefined {
  const raw = firstHeaderValue(value);
  return typeof raw === 'string' && raw.trim() !== '' ? raw : undefined;
}

/**
 * Origin of the call as Fastify resolved it. `req.ip` honours `HTTP_TRUST_PROXY`, so behind a
 * trusted proxy it is the forwarded client address.
 */
export function getClientContext(req: FastifyRequest): ClientContextValue {
  const userAgent = readUserAgentHeader(req.headers['user-agent']);
  const requestId = assignRequestId(req);
  return userAgent ? { ip: req.ip, userAgent, requestId } : { ip: req.ip, requestId };
}

export const ClientContext = createParamDecorator(
  (_data: unknown, ctx: ExecutionContext): ClientContextValue =>
    getClientContext(ctx.switchToHttp().getRequest<FastifyRequest>()),
);
