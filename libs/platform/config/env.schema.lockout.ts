import { Transform } from 'class-transformer';
import { IsBoolean, IsEnum, IsInt, IsOptional, IsString, Min } from 'class-validator';
import { StoreFailurePolicy } from './env.enums';
import { EnvVarsDb } from './env.schema.db';
import { TransformEnvBooleanDefault, TransformEnvInt } from './env.transforms';

export class EnvVarsLockout extends EnvVarsDb {
  @TransformEnvInt(3)
  @IsInt()
  @Min(1)
  LOCKOUT_FAILURE_LIMIT: number = 3;

  @TransformEnvInt(60 * 60)
  @IsInt()
  @Min(1)
  LOCKOUT_COOLOFF_SECONDS: number = 60 * 60;

  @TransformEnvBooleanDefault(false)
  @IsBoolean()
  LOCKOUT_BY_COMBINATION_USER_AND_IP: boolean = false;

  @TransformEnvBooleanDefault(false)
  @IsBoolean()
  LOCKOUT_USE_USER_AGENT: boolean = false;

  @TransformEnvBooleanDefault(false)
  @IsBoolean()
  LOCKOUT_ONLY_USER_FAILURES: boolean = false;

  @Transform(({ value }) =>
    value !== undefined ? String(value).trim().toLowerCase() : StoreFailurePolicy.Open,
  )
  @IsEnum(StoreFailurePolicy)
  LOCKOUT_STORE_FAILURE_POLICY: StoreFailurePolicy = StoreFailurePolicy.Open;

  // Sent by the authentication pipeline in `x-api-key`.
  @IsOptional()
  @IsString()
  LOCKOUT_SERVICE_API_KEY?: string;

  @IsOptional()
  @IsString()
  LOCKOUT_ADMIN_API_KEY?: string;
}
