import { HttpException } from '@nestjs/common';
import type { AppErrorCode } from '../../../shared/app-error-codes';
import { ErrorCode } from './error-codes';

export type ProblemExceptionOptions = {
  title?: string;
  detail?: string;
  code?: AppErrorCode | string;
  type?: string;
  errors?: Array<{ field?: string; message: string }>;
};

export class ProblemException extends HttpException {
  constructor(status: number, options: ProblemExceptionOptions = {}) {
    const { title, detail, code, type, errors } = options;
    super({ title, detail, code, type, errors }, status);
  }

  static unauthorized(detail?: string) {
    return new ProblemException(401, { title: 'Unauthorized', detail, code: ErrorCode.UNAUTHORIZED });
  }

  static notFound(detail?: string) {
    return new ProblemException(404, { title: 'Not Found', detail, code: ErrorCode.NOT_FOUND });
  }

  static internal(detail?: string) {
    return new ProblemException(500, {
      title: 'Internal Server Error',
      detail,
      code: ErrorCode.INTERNAL,
    });
  }
}
