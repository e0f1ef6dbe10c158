export type ApplicationErrorBody = Readonly<{
  code: string;
  message: string;
  details?: readonly FieldError[];
}>;

export type FieldError = Readonly<{
  field: string;
  message: string;
}>;

/**
 * Base for every failure the ledger reports to callers. `code` is the stable
 * machine-readable identifier; `message` is for humans.
 */
export class ApplicationError extends Error {
  constructor(message: string, readonly code: string = 'application_error') {
    super(message);
    this.name = 'ApplicationError';
  }

  toJSON(): ApplicationErrorBody {
    return { code: this.code, message: this.message };
  }
}
