import type { ValidationError } from 'class-validator';
import { ErrorCode } from '../errors/error-codes';
import { ProblemException } from '../errors/problem.exception';

export type FlattenedValidationError = Readonly<{ field: string; message: string }>;

/** One issue per failed constraint; nested properties get dotted paths. */
export function flattenValidationErrors(
  errors: ReadonlyArray<ValidationError>,
  prefix = '',
): FlattenedValidationError[] {
  return errors.flatMap((error) => {
    const field = prefix ? `${prefix}.${error.property}` : error.property;
    const own = Object.values(error.constraints ?? {}).map((message) => ({ field, message }));
    return [...own, ...flattenValidationErrors(error.children ?? [], field)];
  });
}

/** Single-line form for startup failures (`PORT: PORT must be an integer number; ...`). */
export function describeValidationErrors(errors: ReadonlyArray<ValidationError>): string {
  return flattenValidationErrors(errors)
    .map((issue) => `${issue.field}: ${issue.message}`)
    .join('; ');
}

export function toValidationProblem(errors: ReadonlyArray<ValidationError>): ProblemException {
  return new ProblemException(400, {
    title: 'Validation Failed',
    code: ErrorCode.VALIDATION_FAILED,
    errors: flattenValidationErrors(errors),
  });
}
