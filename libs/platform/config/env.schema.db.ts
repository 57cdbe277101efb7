import { IsBoolean, IsOptional, IsString } from 'class-validator';
import { EnvVarsHttp } from './env.schema.http';
import { TransformEnvBooleanDefault } from './env.transforms';

export class EnvVarsDb extends EnvVarsHttp {
  // SQLite (access log + trusted origins)
  @IsOptional()
  @IsString()
  DATABASE_PATH?: string;

  // Redis (attempt counters)
  @IsOptional()
  @IsString()
  REDIS_URL?: string;

  @TransformEnvBooleanDefault(true)
  @IsBoolean()
  REDIS_TLS_REJECT_UNAUTHORIZED: boolean = true;
}
