import { ValidationPipe, type Type } from '@nestjs/common';

/**
 * Validation pipe bound to a DTO class. The class is named explicitly
 * because the runtime loaders do not emit parameter type metadata.
 */
export const validated = <T>(dto: Type<T>): ValidationPipe =>
  new ValidationPipe({
    whitelist: true,
    transform: true,
    forbidUnknownValues: false,
    expectedType: dto,
  });
