import { ApplicationError, type ApplicationErrorBody, type FieldError } from './ApplicationError';

/**
 * One or more command fields failed to parse into value objects.
 */
export class ValidationException extends ApplicationError {
  constructor(readonly details: FieldError[]) {
    super(`Validation failed: ${details.map((d) => `${d.field}: ${d.message}`).join('; ')}`, 'validation_error');
    this.name = 'ValidationException';
  }

  override toJSON(): ApplicationErrorBody {
    return { ...super.toJSON(), details: this.details };
  }
}
