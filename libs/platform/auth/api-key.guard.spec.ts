import type { ExecutionContext } from '@nestjs/common';
import type { ConfigService } from '@nestjs/config';
import { Reflector } from '@nestjs/core';
import type { FastifyRequest } from 'fastify';
import type { PinoLogger } from 'nestjs-pino';
import { ErrorCode } from '../http/errors/error-codes';
import { ProblemException } from '../http/errors/problem.exception';
import { RequireApiKey } from './api-key.decorator';
import { ApiKeyGuard, apiKeysMatch } from './api-key.guard';

type HandlerFn = (...args: unknown[]) => unknown;
type ClassConstructor = new (...args: unknown[]) => unknown;

@RequireApiKey('service')
class ServiceController {
  handler(): void {}
}

class AdminController {
  @RequireApiKey('admin')
  handler(): void {}
}

class UnguardedController {
  handler(): void {}
}

function ctxFor(params: {
  handler: HandlerFn;
  cls: ClassConstructor;
  headers?: Record<string, string>;
}): ExecutionContext {
  const req = { headers: params.headers ?? {}, url: '/v1/lockout/check?x=1', requestId: 'req-1' };
  return {
    getHandler: () => params.handler,
    getClass: () => params.cls,
    switchToHttp: () => ({
      getRequest: () => req as unknown as FastifyRequest,
    }),
  } as unknown as ExecutionContext;
}

function createGuard(values: Record<string, string | undefined>) {
  const logger = { setContext: jest.fn(), warn: jest.fn() };
  const config = { get: (key: string) => values[key] } as unknown as ConfigService;
  const guard = new ApiKeyGuard(new Reflector(), config, logger as unknown as PinoLogger);
  return { guard, logger };
}

function catchProblem(fn: () => unknown): ProblemException {
  try {
    fn();
  } catch (err: unknown) {
    if (err instanceof ProblemException) return err;
    throw err;
  }
  throw new Error('Expected ProblemException');
}

const KEYS = {
  LOCKOUT_SERVICE_API_KEY: 'test-service-key',
  LOCKOUT_ADMIN_API_KEY: 'test-admin-key',
};

describe('ApiKeyGuard', () => {
  it('accepts the key configured for the route role', () => {
    const { guard } = createGuard(KEYS);

    expect(
      guard.canActivate(
        ctxFor({
          handler: ServiceController.prototype.handler,
          cls: ServiceController,
          headers: { 'x-api-key': ' test-service-key ' },
        }),
      ),
    ).toBe(true);
  });

  it('rejects the other role key with 401', () => {
    const { guard } = createGuard(KEYS);

    const problem = catchProblem(() =>
      guard.canActivate(
        ctxFor({
          handler: AdminController.prototype.handler,
          cls: AdminController,
          headers: { 'x-api-key': 'test-service-key' },
        }),
      ),
    );

    expect(problem.getStatus()).toBe(401);
    expect(problem.getResponse()).toMatchObject({
      code: ErrorCode.UNAUTHORIZED,
      detail: 'Invalid API key',
    });
  });

  it('rejects a missing header', () => {
    const { guard } = createGuard(KEYS);

    const problem = catchProblem(() =>
      guard.canActivate(ctxFor({ handler: ServiceController.prototype.handler, cls: ServiceController })),
    );

    expect(problem.getResponse()).toMatchObject({ detail: 'Missing API key' });
  });

  it('keeps routes closed while their key is unset', () => {
    const { guard, logger } = createGuard({ LOCKOUT_ADMIN_API_KEY: 'test-admin-key' });

    const problem = catchProblem(() =>
      guard.canActivate(
        ctxFor({
          handler: ServiceController.prototype.handler,
          cls: ServiceController,
          headers: { 'x-api-key': 'anything' },
        }),
      ),
    );

    expect(problem.getStatus()).toBe(401);
    expect(logger.warn).toHaveBeenCalledWith(
      { role: 'service', traceId: 'req-1', path: '/v1/lockout/check' },
      'API key route called but no key is configured',
    );
  });

  it('rejects routes that never declared a role', () => {
    const { guard } = createGuard(KEYS);

    const problem = catchProblem(() =>
      guard.canActivate(
        ctxFor({
          handler: UnguardedController.prototype.handler,
          cls: UnguardedController,
          headers: { 'x-api-key': 'test-service-key' },
        }),
      ),
    );

    expect(problem.getStatus()).toBe(401);
  });
});

describe('apiKeysMatch', () => {
  it('compares keys of different lengths without throwing', () => {
    expect(apiKeysMatch('short', 'a-much-longer-key')).toBe(false);
    expect(apiKeysMatch('test-secret', 'test-secret')).toBe(true);
  });
});
