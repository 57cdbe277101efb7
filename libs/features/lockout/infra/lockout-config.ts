import type { ConfigService } from '@nestjs/config';
import { StoreFailurePolicy } from '../../../platform/config/env.enums';
import { createLockoutPolicy } from '../domain/lockout-policy';
import type { LockoutConfig } from '../app/lockout.config';

/** Throws `LockoutConfigurationError` on an invalid combination, failing the boot. */
export function buildLockoutConfig(config: ConfigService): LockoutConfig {
  const policy = createLockoutPolicy({
    failureLimit: config.get<number>('LOCKOUT_FAILURE_LIMIT') ?? 3,
    cooloffSeconds: config.get<number>('LOCKOUT_COOLOFF_SECONDS') ?? 60 * 60,
    lockoutByCombinationUserAndIp: config.get<boolean>('LOCKOUT_BY_COMBINATION_USER_AND_IP'),
    useUserAgent: config.get<boolean>('LOCKOUT_USE_USER_AGENT'),
    onlyUserFailures: config.get<boolean>('LOCKOUT_ONLY_USER_FAILURES'),
  });

  const failurePolicy = config.get<StoreFailurePolicy>('LOCKOUT_STORE_FAILURE_POLICY');
  return {
    policy,
    storeFailurePolicy: failurePolicy === StoreFailurePolicy.Closed ? 'closed' : 'open',
  };
}
