import { CallHandler, ExecutionContext, Injectable, NestInterceptor } from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import type { FastifyReply } from 'fastify';
import { Observable } from 'rxjs';
import { map } from 'rxjs/operators';
import { SKIP_ENVELOPE_KEY } from '../decorators/skip-envelope.decorator';

export type Envelope = { data: unknown; meta?: Record<string, unknown> };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * `{ items, ...rest }` becomes `{ data: items, meta: rest }`; anything else that is not already
 * enveloped becomes `{ data }`.
 */
export function toEnvelope(data: unknown): unknown {
  if (data === undefined || data === null) return data;
  if (typeof data === 'string' || Buffer.isBuffer(data)) return data;

  if (isRecord(data) && Array.isArray(data.items)) {
    const meta: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(data)) {
      if (key === 'items' || value === undefined) continue;
      // defineProperty keeps a `__proto__` key an own property instead of a prototype swap.
      Object.defineProperty(meta, key, { value, enumerable: true, writable: true, configurable: true });
    }
    const envelope: Envelope = { data: data.items };
    if (Object.keys(meta).length > 0) envelope.meta = meta;
    return envelope;
  }

  if (isRecord(data) && 'data' in data) return data;
  return { data };
}

@Injectable()
export class ResponseEnvelopeInterceptor implements NestInterceptor<unknown, unknown> {
  constructor(private readonly reflector: Reflector) {}

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const reply = context.switchToHttp().getResponse<FastifyReply>();
    const skip = this.reflector.getAllAndOverride<boolean | undefined>(SKIP_ENVELOPE_KEY, [
      context.getHandler(),
      context.getClass(),
    ]);

    return next.handle().pipe(
      map((data: unknown) => {
        if (skip || reply.statusCode === 204) return data;
        return toEnvelope(data);
      }),
    );
  }
}
