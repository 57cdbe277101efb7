import { ArgumentsHost, Catch, ExceptionFilter, HttpException, HttpStatus } from '@nestjs/common';
import type { FastifyReply, FastifyRequest } from 'fastify';
import type { AppErrorCode } from '../../../shared/app-error-codes';
import { ErrorCode } from '../errors/error-codes';
import '../fastify-request';
import { normalizeRequestId } from '../request-id';

export type ProblemIssue = Readonly<{ field?: string; message: string }>;

export type ProblemDetails = Readonly<{
  type: string;
  title: string;
  status: number;
  detail?: string;
  errors?: ReadonlyArray<ProblemIssue>;
  code: AppErrorCode | string;
  traceId?: string;
}>;

type HttpExceptionBody = {
  title?: unknown;
  message?: unknown;
  detail?: unknown;
  code?: unknown;
  type?: unknown;
  errors?: unknown;
};

const STATUS_TITLES: Readonly<Record<number, string>> = {
  [HttpStatus.BAD_REQUEST]: 'Bad Request',
  [HttpStatus.UNAUTHORIZED]: 'Unauthorized',
  [HttpStatus.FORBIDDEN]: 'Forbidden',
  [HttpStatus.NOT_FOUND]: 'Not Found',
  [HttpStatus.CONFLICT]: 'Conflict',
  [HttpStatus.UNPROCESSABLE_ENTITY]: 'Unprocessable Entity',
  [HttpStatus.TOO_MANY_REQUESTS]: 'Too Many Requests',
  [HttpStatus.INTERNAL_SERVER_ERROR]: 'Internal Server Error',
  [HttpStatus.NOT_IMPLEMENTED]: 'Not Implemented',
  [HttpStatus.SERVICE_UNAVAILABLE]: 'Service Unavailable',
};

export function statusTitle(status: number): string {
  return STATUS_TITLES[status] ?? (status >= 500 ? 'Internal Server Error' : 'Error');
}

export function defaultErrorCode(status: number): ErrorCode {
  if (status >= 500) return ErrorCode.INTERNAL;
  switch (status) {
    case HttpStatus.UNAUTHORIZED:
      return ErrorCode.UNAUTHORIZED;
    case HttpStatus.FORBIDDEN:
      return ErrorCode.FORBIDDEN;
    case HttpStatus.NOT_FOUND:
      return ErrorCode.NOT_FOUND;
    case HttpStatus.CONFLICT:
      return ErrorCode.CONFLICT;
    case HttpStatus.TOO_MANY_REQUESTS:
      return ErrorCode.RATE_LIMITED;
    default:
      return ErrorCode.VALIDATION_FAILED;
  }
}

function asText(value: unknown): string | undefined {
  return typeof value === 'string' && value.trim() !== '' ? value : undefined;
}

function asIssues(value: unknown): ProblemIssue[] | undefined {
  if (!Array.isArray(value)) return undefined;
  const issues: ProblemIssue[] = [];
  for (const item of value) {
    if (typeof item !== 'object' || item === null || !('message' in item)) continue;
    const message = item.message;
    const field = 'field' in item ? item.field : undefined;
    if (typeof message !== 'string') continue;
    issues.push(typeof field === 'string' ? { field, message } : { message });
  }
  return issues.length > 0 ? issues : undefined;
}

function detailFrom(body: HttpExceptionBody): string | undefined {
  if (Array.isArray(body.message)) {
    // Nest's own pipes report a list of messages.
    return body.message.filter((m): m is string => typeof m === 'string').join('; ');
  }
  return asText(body.detail) ?? asText(body.message);
}

/**
 * Builds an RFC 7807 body. Non-HTTP errors become a bare 500 so internal messages (for example a
 * Redis connection string) never reach callers.
 */
export function toProblemDetails(exception: unknown, traceId: string | undefined): ProblemDetails {
  if (!(exception instanceof HttpException)) {
    return {
      type: 'about:blank',
      title: statusTitle(HttpStatus.INTERNAL_SERVER_ERROR),
      status: HttpStatus.INTERNAL_SERVER_ERROR,
      code: ErrorCode.INTERNAL,
      ...(traceId ? { traceId } : {}),
    };
  }

  const status = exception.getStatus();
  const response = exception.getResponse();
  const body: HttpExceptionBody =
    typeof response === 'object' && response !== null ? response : { title: response };

  const detail = detailFrom(body);
  const errors = asIssues(body.errors);
  return {
    type: asText(body.type) ?? 'about:blank',
    title: asText(body.title) ?? statusTitle(status),
    status,
    ...(detail ? { detail } : {}),
    ...(errors ? { errors } : {}),
    code: asText(body.code) ?? defaultErrorCode(status),
    ...(traceId ? { traceId } : {}),
  };
}

@Catch()
export class ProblemDetailsFilter implements ExceptionFilter {
  catch(exception: unknown, host: ArgumentsHost) {
    const ctx = host.switchToHttp();
    const req = ctx.getRequest<FastifyRequest>();
    const reply = ctx.getResponse<FastifyReply>();

    const traceId =
      req.requestId ?? normalizeRequestId(req.id) ?? normalizeRequestId(req.headers['x-request-id']);
    const problem = toProblemDetails(exception, traceId);

    if (traceId) reply.header('X-Request-Id', traceId);
    reply.header('Content-Type', 'application/problem+json');
    reply.status(problem.status).send(problem);
  }
}
