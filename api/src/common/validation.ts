import { ValidationPipe } from '@nestjs/common';
import type { ValidationError } from 'class-validator';
import { RequestValidationError } from './errors';

/** First constraint message, walking properties in declaration order. */
export function firstValidationMessage(errors: ValidationError[]): string {
  for (const error of errors) {
    const messages = Object.values(error.constraints ?? {});
    if (messages.length > 0) return messages[0];
    if (error.children?.length) return firstValidationMessage(error.children);
  }
  return 'Invalid request';
}

// Strict request validation; unknown query parameters are stripped, not rejected.
export function createValidationPipe(): ValidationPipe {
  return new ValidationPipe({
    whitelist: true,
    forbidNonWhitelisted: false,
    transform: true,
    stopAtFirstError: true,
    exceptionFactory: (errors) => new RequestValidationError(firstValidationMessage(errors)),
  });
}
