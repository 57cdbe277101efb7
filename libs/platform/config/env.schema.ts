import { Transform } from 'class-transformer';
import { IsBoolean, IsEnum, IsOptional, IsString, IsUrl } from 'class-validator';
import { LogLevel } from './log-level';
import { EnvVarsLockout } from './env.schema.lockout';
import { TransformEnvBoolean } from './env.transforms';

export class EnvVars extends EnvVarsLockout {
  // Observability (OTLP)
  @IsOptional()
  @IsString()
  OTEL_SERVICE_NAME?: string;

  @IsOptional()
  @IsUrl({ require_tld: false })
  OTEL_EXPORTER_OTLP_ENDPOINT?: string;

  @IsOptional()
  @IsString()
  OTEL_EXPORTER_OTLP_HEADERS?: string;

  // Logging
  @Transform(({ value }) => (value !== undefined ? String(value).trim().toLowerCase() : undefined))
  @IsOptional()
  @IsEnum(LogLevel)
  LOG_LEVEL?: LogLevel;

  @TransformEnvBoolean()
  @IsOptional()
  @IsBoolean()
  LOG_PRETTY?: boolean;
}
