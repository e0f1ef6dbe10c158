import { ApplicationError } from '@cipherledger/application';

export class LedgerRequestError extends ApplicationError {
  constructor(
    message: string,
    code: string,
    readonly status?: number,
    readonly payload?: unknown
  ) {
    super(message, code);
    this.name = 'LedgerRequestError';
  }
}

export class InvalidScoreError extends ApplicationError {
  constructor(score: number) {
    super(`Score must be an integer from 1 to 10, got ${score}`, 'invalid_score');
    this.name = 'InvalidScoreError';
  }
}
