import { NodeEnv } from './env.enums';
import type { EnvVars } from './env.schema';

function hasText(value: string | undefined): boolean {
  return typeof value === 'string' && value.trim() !== '';
}

export function requireInProductionLike(env: EnvVars) {
  const productionLike = env.NODE_ENV === NodeEnv.Production || env.NODE_ENV === NodeEnv.Staging;
  if (!productionLike) return;

  const missing: string[] = [];
  if (env.HTTP_TRUST_PROXY === undefined) missing.push('HTTP_TRUST_PROXY');
  if (!hasText(env.REDIS_URL)) missing.push('REDIS_URL');
  if (!hasText(env.LOCKOUT_SERVICE_API_KEY)) missing.push('LOCKOUT_SERVICE_API_KEY');
  if (!hasText(env.LOCKOUT_ADMIN_API_KEY)) missing.push('LOCKOUT_ADMIN_API_KEY');

  if (missing.length > 0) {
    throw new Error(
      `Missing required environment variables for ${env.NODE_ENV}: ${missing.join(', ')}`,
    );
  }
}

export function assertLockoutModeConsistency(env: EnvVars) {
  if (env.LOCKOUT_ONLY_USER_FAILURES && env.LOCKOUT_BY_COMBINATION_USER_AND_IP) {
    throw new Error(
      'Conflicting environment variables: LOCKOUT_ONLY_USER_FAILURES and LOCKOUT_BY_COMBINATION_USER_AND_IP cannot both be enabled',
    );
  }
}

export function assertApiKeysDistinct(env: EnvVars) {
  const service = env.LOCKOUT_SERVICE_API_KEY?.trim();
  const admin = env.LOCKOUT_ADMIN_API_KEY?.trim();
  if (service && admin && service === admin) {
    throw new Error(
      'Conflicting environment variables: LOCKOUT_ADMIN_API_KEY must differ from LOCKOUT_SERVICE_API_KEY',
    );
  }
}
