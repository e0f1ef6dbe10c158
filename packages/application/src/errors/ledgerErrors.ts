import { ApplicationError } from './ApplicationError';

export const LedgerErrorCodes = {
  invalidAddress: 'invalid_address',
  emptyProof: 'empty_proof',
  invalidProof: 'invalid_proof',
  capacityExceeded: 'capacity_exceeded',
  indexOutOfBounds: 'index_out_of_bounds',
  invalidRange: 'invalid_range',
  rangeOutOfBounds: 'range_out_of_bounds',
  batchSizeInvalid: 'batch_size_invalid',
  capabilityDenied: 'capability_denied',
  invalidAuthorization: 'invalid_authorization',
  remoteServiceUnavailable: 'remote_service_unavailable',
  concurrentUpdate: 'concurrent_update',
} as const;

export type LedgerErrorCode = (typeof LedgerErrorCodes)[keyof typeof LedgerErrorCodes];

export class InvalidAddressError extends ApplicationError {
  constructor(message = 'Invalid user address') {
    super(message, LedgerErrorCodes.invalidAddress);
    this.name = 'InvalidAddressError';
  }
}

export class EmptyProofError extends ApplicationError {
  constructor(message = 'Input proof cannot be empty') {
    super(message, LedgerErrorCodes.emptyProof);
    this.name = 'EmptyProofError';
  }
}

export class InvalidProofError extends ApplicationError {
  constructor(message = 'Invalid input proof') {
    super(message, LedgerErrorCodes.invalidProof);
    this.name = 'InvalidProofError';
  }
}

export class CapacityExceededError extends ApplicationError {
  constructor(message = 'Maximum trust events reached') {
    super(message, LedgerErrorCodes.capacityExceeded);
    this.name = 'CapacityExceededError';
  }
}

export class IndexOutOfBoundsError extends ApplicationError {
  constructor(message = 'Index out of bounds') {
    super(message, LedgerErrorCodes.indexOutOfBounds);
    this.name = 'IndexOutOfBoundsError';
  }
}

export class InvalidRangeError extends ApplicationError {
  constructor(message = 'Invalid range') {
    super(message, LedgerErrorCodes.invalidRange);
    this.name = 'InvalidRangeError';
  }
}

export class RangeOutOfBoundsError extends ApplicationError {
  constructor(message = 'End index out of bounds') {
    super(message, LedgerErrorCodes.rangeOutOfBounds);
    this.name = 'RangeOutOfBoundsError';
  }
}

export class BatchSizeInvalidError extends ApplicationError {
  constructor(message = 'Batch size must be 1-10') {
    super(message, LedgerErrorCodes.batchSizeInvalid);
    this.name = 'BatchSizeInvalidError';
  }
}

export class CapabilityDeniedError extends ApplicationError {
  constructor(message = 'Principal may not decrypt this handle') {
    super(message, LedgerErrorCodes.capabilityDenied);
    this.name = 'CapabilityDeniedError';
  }
}

export class InvalidAuthorizationError extends ApplicationError {
  constructor(message = 'Decryption authorization is not valid') {
    super(message, LedgerErrorCodes.invalidAuthorization);
    this.name = 'InvalidAuthorizationError';
  }
}

export class RemoteServiceUnavailableError extends ApplicationError {
  constructor(message = 'Re-encryption service unavailable') {
    super(message, LedgerErrorCodes.remoteServiceUnavailable);
    this.name = 'RemoteServiceUnavailableError';
  }
}

/**
 * The stored record moved on after the ledger was loaded; nothing was written.
 */
export class ConcurrentUpdateError extends ApplicationError {
  constructor(
    readonly user: string,
    readonly expectedVersion: number,
    readonly currentVersion: number | null
  ) {
    super(
      currentVersion === null
        ? `Ledger of ${user} was created concurrently`
        : `Ledger of ${user} is at version ${currentVersion}, expected ${expectedVersion}`,
      LedgerErrorCodes.concurrentUpdate
    );
    this.name = 'ConcurrentUpdateError';
  }
}
