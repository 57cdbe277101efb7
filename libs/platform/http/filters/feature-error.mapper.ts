import type { ArgumentsHost } from '@nestjs/common';
import type { FastifyReply } from 'fastify';
import type { AppErrorCode } from '../../../shared/app-error-codes';
import { ErrorCode } from '../errors/error-codes';
import { ProblemException } from '../errors/problem.exception';
import { statusTitle } from './problem-details.filter';

export type FeatureErrorIssue = Readonly<{ field?: string; message: string }>;

type MapFeatureErrorToProblemParams = Readonly<{
  status: number;
  code: AppErrorCode;
  detail?: string;
  issues?: ReadonlyArray<FeatureErrorIssue>;
}>;

function isPositiveRetryAfter(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value > 0;
}

/** Feature filters translate their domain errors through here so every feature shares one shape. */
export function mapFeatureErrorToProblem(params: MapFeatureErrorToProblemParams): ProblemException {
  return new ProblemException(params.status, {
    title:
      params.code === ErrorCode.VALIDATION_FAILED ? 'Validation Failed' : statusTitle(params.status),
    detail: params.detail,
    code: params.code,
    errors: params.issues ? [...params.issues] : undefined,
  });
}

export function applyRetryAfterHeader(host: ArgumentsHost, retryAfterSeconds: unknown): void {
  if (!isPositiveRetryAfter(retryAfterSeconds)) return;
  host.switchToHttp().getResponse<FastifyReply>().header('Retry-After', String(retryAfterSeconds));
}
