import { plainToInstance } from 'class-transformer';
import { validateSync } from 'class-validator';
import { describeValidationErrors } from '../http/validation/validation-errors';
import {
  assertApiKeysDistinct,
  assertLockoutModeConsistency,
  requireInProductionLike,
} from './env.invariants';
import { EnvVars } from './env.schema';

export function validateEnv(config: Record<string, unknown>): EnvVars {
  const validated = plainToInstance(EnvVars, config, { enableImplicitConversion: true });
  const errors = validateSync(validated, {
    skipMissingProperties: false,
  });

  if (errors.length > 0) {
    throw new Error(`Invalid environment variables: ${describeValidationErrors(errors)}`);
  }

  requireInProductionLike(validated);
  assertLockoutModeConsistency(validated);
  assertApiKeysDistinct(validated);
  return validated;
}
