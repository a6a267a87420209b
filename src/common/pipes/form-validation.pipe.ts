import { ValidationError, ValidationPipe } from '@nestjs/common';
import { FormValidationException } from '../exceptions/flash.exception';

/** First constraint message found, depth first, in declaration order. */
export function firstValidationMessage(errors: ValidationError[]): string {
  for (const error of errors) {
    const messages = Object.values(error.constraints ?? {});
    if (messages.length > 0) {
      return messages[0];
    }
    const nested = firstValidationMessage(error.children ?? []);
    if (nested) {
      return nested;
    }
  }
  return '';
}

export function createFormValidationPipe(): ValidationPipe {
  return new ValidationPipe({
    transform: true, // Enable automatic transformation using class-transformer
    whitelist: true, // Strip properties that don't have decorators
    forbidNonWhitelisted: false,
    exceptionFactory: (errors: ValidationError[]) =>
      new FormValidationException(firstValidationMessage(errors) || 'Datos inválidos'),
  });
}
