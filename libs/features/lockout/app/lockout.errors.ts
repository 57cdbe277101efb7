import type { ErrorCode } from '../../../shared/error-codes';
import type { LockoutErrorCode } from './lockout.error-codes';

export type LockoutIssue = Readonly<{ field?: string; message: string }>;

export type LockoutErrorCodeValue = LockoutErrorCode | ErrorCode;

export class LockoutError extends Error {
  readonly status: number;
  readonly code: LockoutErrorCodeValue;
  readonly issues?: ReadonlyArray<LockoutIssue>;
  readonly retryAfterSeconds?: number;

  constructor(params: {
    status: number;
    code: LockoutErrorCodeValue;
    message?: string;
    issues?: ReadonlyArray<LockoutIssue>;
    retryAfterSeconds?: number;
  }) {
    super(params.message ?? params.code);
    this.status = params.status;
    this.code = params.code;
    this.issues = params.issues;
    this.retryAfterSeconds = params.retryAfterSeconds;
  }
}

export class AttemptStoreUnavailableError extends Error {
  readonly operation: string;
  readonly cause: unknown;

  constructor(operation: string, cause: unknown) {
    super(`Attempt store unavailable during ${operation}`);
    this.name = 'AttemptStoreUnavailableError';
    this.operation = operation;
    this.cause = cause;
  }
}
