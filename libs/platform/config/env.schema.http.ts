import { Transform } from 'class-transformer';
import { IsBoolean, IsEnum, IsInt, IsOptional, IsString, Min } from 'class-validator';
import { NodeEnv } from './env.enums';
import { TransformEnvBoolean, TransformEnvInt } from './env.transforms';

export class EnvVarsHttp {
  @Transform(({ value }) => (value !== undefined ? String(value) : NodeEnv.Development))
  @IsEnum(NodeEnv)
  NODE_ENV: NodeEnv = NodeEnv.Development;

  // HTTP / proxies
  // When true, Fastify trusts `X-Forwarded-*` headers and `req.ip` reflects the client IP behind a
  // reverse proxy. Lockout scopes are keyed by that IP, so only enable it behind trusted proxies
  // (otherwise clients can spoof their origin and dodge IP lockouts).
  @TransformEnvBoolean()
  @IsOptional()
  @IsBoolean()
  HTTP_TRUST_PROXY?: boolean;

  @IsOptional()
  @IsString()
  HOST?: string;

  @TransformEnvInt(4000)
  @IsInt()
  @Min(0)
  PORT: number = 4000;

  @TransformEnvBoolean()
  @IsOptional()
  @IsBoolean()
  SWAGGER_UI_ENABLED?: boolean;
}
