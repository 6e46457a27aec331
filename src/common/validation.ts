import { ValidationPipe } from '@nestjs/common';
import { ValidationError as ConstraintViolation } from 'class-validator';
import { ValidationError } from './errors';

function collectMessages(violations: ConstraintViolation[]): string[] {
  return violations.flatMap((violation) => [
    ...Object.values(violation.constraints ?? {}),
    ...collectMessages(violation.children ?? []),
  ]);
}

/**
 * Global pipe for request bodies. Unknown properties are stripped and
 * violations are reported as VALIDATION_FAILED.
 */
export function createValidationPipe(): ValidationPipe {
  return new ValidationPipe({
    whitelist: true,
    transform: true,
    exceptionFactory: (violations: ConstraintViolation[]) =>
      new ValidationError(collectMessages(violations).join('; ')),
  });
}
