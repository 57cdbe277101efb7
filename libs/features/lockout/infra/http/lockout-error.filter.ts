import { ArgumentsHost, Catch, ExceptionFilter } from '@nestjs/common';
import {
  applyRetryAfterHeader,
  mapFeatureErrorToProblem,
} from '../../../../platform/http/filters/feature-error.mapper';
import { ProblemDetailsFilter } from '../../../../platform/http/filters/problem-details.filter';
import { LockoutError } from '../../app/lockout.errors';

@Catch(LockoutError)
export class LockoutErrorFilter implements ExceptionFilter {
  private readonly problemDetailsFilter = new ProblemDetailsFilter();

  catch(exception: LockoutError, host: ArgumentsHost): void {
    applyRetryAfterHeader(host, exception.retryAfterSeconds);

    const mapped = mapFeatureErrorToProblem({
      status: exception.status,
      code: exception.code,
      detail: exception.message,
      issues: exception.issues,
    });

    this.problemDetailsFilter.catch(mapped, host);
  }
}
