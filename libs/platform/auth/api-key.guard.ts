import type { CanActivate, ExecutionContext } from '@nestjs/common';
import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Reflector } from '@nestjs/core';
import { createHash, timingSafeEqual } from 'crypto';
import type { FastifyRequest } from 'fastify';
import { PinoLogger } from 'nestjs-pino';
import { ErrorCode } from '../http/errors/error-codes';
import { ProblemException } from '../http/errors/problem.exception';
import '../http/fastify-request';
import { API_KEY_ENV, API_KEY_HEADER, API_KEY_ROLE_KEY, type ApiKeyRole } from './api-key.types';

function getApiKeyHeader(req: FastifyRequest): string | undefined {
  const raw = req.headers[API_KEY_HEADER];
  const value = Array.isArray(raw) ? raw[0] : raw;
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function stripQueryString(url: string): string {
  const idx = url.indexOf('?');
  return idx === -1 ? url : url.slice(0, idx);
}

function digest(value: string): Buffer {
  return createHash('sha256').update(value, 'utf8').digest();
}

/** Constant-time comparison; hashing first equalizes lengths. */
export function apiKeysMatch(presented: string, expected: string): boolean {
  return timingSafeEqual(digest(presented), digest(expected));
}

function unauthorized(detail: string): ProblemException {
  return new ProblemException(401, { title: 'Unauthorized', detail, code: ErrorCode.UNAUTHORIZED });
}

@Injectable()
export class ApiKeyGuard implements CanActivate {
  constructor(
    private readonly reflector: Reflector,
    private readonly config: ConfigService,
    private readonly logger: PinoLogger,
  ) {
    this.logger.setContext(ApiKeyGuard.name);
  }

  canActivate(context: ExecutionContext): boolean {
    const role = this.reflector.getAllAndOverride<ApiKeyRole | undefined>(API_KEY_ROLE_KEY, [
      context.getHandler(),
      context.getClass(),
    ]);
    const req = context.switchToHttp().getRequest<FastifyRequest>();

    const expected = role ? this.config.get<string>(API_KEY_ENV[role])?.trim() : undefined;
    if (!role || !expected) {
      // Routes stay closed until their key is configured.
      this.logger.warn(
        { role, traceId: req.requestId, path: stripQueryString(req.url) },
        'API key route called but no key is configured',
      );
      throw unauthorized('API key authentication is not configured for this route');
    }

    const presented = getApiKeyHeader(req);
    if (!presented) throw unauthorized('Missing API key');
    if (!apiKeysMatch(presented, expected)) throw unauthorized('Invalid API key');
    return true;
  }
}
