import { applyDecorators } from '@nestjs/common';
import { ApiExtension } from '@nestjs/swagger';
import type { AppErrorCode } from '../../../shared/app-error-codes';

/** Lists the `code` values a route can answer with as the `x-error-codes` OpenAPI extension. */
export function ApiErrorCodes(codes: ReadonlyArray<AppErrorCode>) {
  return applyDecorators(ApiExtension('x-error-codes', [...codes]));
}
