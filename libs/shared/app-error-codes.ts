import type { ErrorCode } from './error-codes';
import type { LockoutErrorCode } from './lockout/lockout-error-codes';

export type AppErrorCode = ErrorCode | LockoutErrorCode;
