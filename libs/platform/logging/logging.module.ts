import { Global, Module, type DynamicModule, RequestMethod } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { LoggerModule, type Params } from 'nestjs-pino';
import type { IncomingMessage, ServerResponse } from 'node:http';
import { context as otelContext, trace as otelTrace } from '@opentelemetry/api';
import { stdSerializers } from 'pino';
import { assignRequestId } from '../http/request-id';
import { deriveServiceName, normalizeNodeEnv } from '../config/env.runtime';
import { LogLevel } from '../config/log-level';
import { isPrettyLogsEnabled, resolveLogLevel, type LoggingRole } from './logging.policy';
import { DEFAULT_REDACT_PATHS } from './redaction';

function asNonEmptyString(value: unknown): string | undefined {
  return typeof value === 'string' && value.trim() !== '' ? value : undefined;
}

function getActiveOtelContext(): { otelTraceId: string; otelSpanId: string } | undefined {
  const spanContext = otelTrace.getSpan(otelContext.active())?.spanContext();
  if (!spanContext) return undefined;
  return { otelTraceId: spanContext.traceId, otelSpanId: spanContext.spanId };
}

export function responseLogLevel(statusCode: number, err?: Error): LogLevel {
  if (err) return LogLevel.Error;
  if (statusCode >= 500) return LogLevel.Error;
  // A locked-out login is an expected answer; the lockout service logs it with context.
  if (statusCode === 429) return LogLevel.Info;
  if (statusCode >= 400) return LogLevel.Warn;
  return LogLevel.Info;
}

export function buildLoggerParams(config: ConfigService, role: LoggingRole): Params {
  const nodeEnv = normalizeNodeEnv(config.get<string>('NODE_ENV'));
  const level = resolveLogLevel(nodeEnv, config.get<LogLevel>('LOG_LEVEL'), role);
  const pretty = isPrettyLogsEnabled(nodeEnv, config.get<boolean>('LOG_PRETTY'));
  const service = deriveServiceName({
    otelServiceName: config.get<string>('OTEL_SERVICE_NAME'),
    role,
  });

  const pinoHttp: Params['pinoHttp'] = {
    level,
    base: { service, env: nodeEnv, role },
    mixin: () => getActiveOtelContext() ?? {},
    ...(pretty
      ? {
          transport: {
            target: 'pino-pretty',
            options: { colorize: true, translateTime: 'SYS:standard', singleLine: false },
          },
        }
      : {}),
    genReqId: (req) => assignRequestId(req),
    customProps: (req) => {
      const requestId = assignRequestId(req);
      return { requestId, traceId: requestId, ...(getActiveOtelContext() ?? {}) };
    },
    customLogLevel: (_req, res, err) => responseLogLevel(res.statusCode, err),
    redact: { paths: [...DEFAULT_REDACT_PATHS], remove: true },
    serializers: {
      req(req: IncomingMessage) {
        return {
          id: assignRequestId(req),
          method: asNonEmptyString(req.method),
          url: asNonEmptyString(req.url),
        };
      },
      res(res: ServerResponse) {
        return { statusCode: res.statusCode };
      },
      err: stdSerializers.err,
    },
  };

  return {
    pinoHttp,
    forRoutes: [{ path: '*path', method: RequestMethod.ALL }],
    exclude: [
      { method: RequestMethod.ALL, path: 'health' },
      { method: RequestMethod.ALL, path: 'ready' },
    ],
  };
}

@Global()
@Module({})
export class LoggingModule {
  static forRoot(role: LoggingRole): DynamicModule {
    return {
      module: LoggingModule,
      imports: [
        LoggerModule.forRootAsync({
          inject: [ConfigService],
          useFactory: (config: ConfigService): Params => buildLoggerParams(config, role),
        }),
      ],
      exports: [LoggerModule],
    };
  }
}
