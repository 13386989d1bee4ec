import { BadRequestException, ValidationPipe } from '@nestjs/common';

import { flattenValidationErrors } from '@/common/utils/validation.utils';

/**
 * Global request validation: unknown properties are rejected and failures
 * are reported per field under `details.fields`.
 */
export function createValidationPipe(): ValidationPipe {
  return new ValidationPipe({
    whitelist: true,
    forbidNonWhitelisted: true,
    transform: true,
    transformOptions: {
      enableImplicitConversion: true,
    },
    exceptionFactory: (errors) =>
      new BadRequestException({
        message: 'Validation failed',
        error: 'Bad Request',
        details: { fields: flattenValidationErrors(errors) },
      }),
  });
}
