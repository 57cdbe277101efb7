import type { PinoLogger } from 'nestjs-pino';
import type { LockoutAdminService } from '../../app/lockout-admin.service';
import type { LockoutService } from '../../app/lockout.service';
import { LockoutAdminController } from './lockout-admin.controller';

function asAdminService(service: Partial<LockoutAdminService>): LockoutAdminService {
  return service as LockoutAdminService;
}

function asLockoutService(service: Partial<LockoutService>): LockoutService {
  return service as LockoutService;
}

function makeLogger() {
  const logger = { setContext: jest.fn(), info: jest.fn() };
  return { logger, pino: logger as unknown as PinoLogger };
}

describe('LockoutAdminController', () => {
  it('resets through the lockout service without logging the reset a second time', async () => {
    const reset = jest.fn(async () => 2);
    const { logger, pino } = makeLogger();
    const controller = new LockoutAdminController(
      asAdminService({}),
      asLockoutService({ reset }),
      pino,
    );

    await expect(controller.resetAttempts({ username: 'bob' })).resolves.toEqual({ removed: 2 });

    expect(reset).toHaveBeenCalledWith({ ip: undefined, username: 'bob' });
    expect(logger.info).not.toHaveBeenCalled();
  });

  it('logs a trust revocation with its filter', async () => {
    const revokeTrust = jest.fn(async () => 1);
    const { logger, pino } = makeLogger();
    const controller = new LockoutAdminController(
      asAdminService({ revokeTrust }),
      asLockoutService({}),
      pino,
    );

    await expect(controller.revokeTrusted({ ip: '10.0.0.1' })).resolves.toEqual({ removed: 1 });

    expect(logger.info).toHaveBeenCalledTimes(1);
    expect(logger.info).toHaveBeenCalledWith(
      { ip: '10.0.0.1', username: undefined, removed: 1 },
      'Operator revoked trust',
    );
  });
});
