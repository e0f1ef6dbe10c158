import type { FieldError } from '../errors/ApplicationError';
import { ValidationException } from '../errors/ValidationError';

export type FieldParser<TInput, TResult> = (input: TInput) => TResult;

export type ParsedFromSpec<TInput, TSpec extends Record<string, FieldParser<TInput, unknown>>> = {
  [TKey in keyof TSpec]: TSpec[TKey] extends FieldParser<TInput, infer TResult> ? TResult : never;
};

/**
 * Parse primitives into richer types according to a field specification.
 *
 * Every parser runs; failures are collected per field and re-thrown as a
 * single ValidationException.
 */
export function parseFields<TInput, TSpec extends Record<string, FieldParser<TInput, unknown>>>(
  input: TInput,
  spec: TSpec
): ParsedFromSpec<TInput, TSpec> {
  const errors: FieldError[] = [];
  const result: Record<string, unknown> = {};

  for (const field of Object.keys(spec)) {
    try {
      result[field] = spec[field](input);
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Invalid value';
      errors.push({ field, message });
    }
  }

  if (errors.length > 0) {
    throw new ValidationException(errors);
  }

  // Every key of spec has been assigned the return value of its parser.
  return result as ParsedFromSpec<TInput, TSpec>;
}
