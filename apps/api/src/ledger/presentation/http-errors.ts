import {
  BadRequestException,
  ConflictException,
  ForbiddenException,
  HttpException,
  NotFoundException,
  ServiceUnavailableException,
  UnauthorizedException,
  UnprocessableEntityException,
} from '@nestjs/common';
import { ApplicationError, LedgerErrorCodes, type ApplicationErrorBody } from '@cipherledger/application';

const VALIDATION_ERROR_CODE = 'validation_error';

type HttpExceptionFactory = (body: ApplicationErrorBody) => HttpException;

const byCode: Record<string, HttpExceptionFactory> = {
  [VALIDATION_ERROR_CODE]: (body) => new BadRequestException(body),
  [LedgerErrorCodes.invalidAddress]: (body) => new BadRequestException(body),
  [LedgerErrorCodes.emptyProof]: (body) => new BadRequestException(body),
  [LedgerErrorCodes.invalidRange]: (body) => new BadRequestException(body),
  [LedgerErrorCodes.batchSizeInvalid]: (body) => new BadRequestException(body),
  [LedgerErrorCodes.invalidProof]: (body) => new UnprocessableEntityException(body),
  [LedgerErrorCodes.capacityExceeded]: (body) => new ConflictException(body),
  [LedgerErrorCodes.concurrentUpdate]: (body) => new ConflictException(body),
  [LedgerErrorCodes.indexOutOfBounds]: (body) => new NotFoundException(body),
  [LedgerErrorCodes.rangeOutOfBounds]: (body) => new NotFoundException(body),
  [LedgerErrorCodes.capabilityDenied]: (body) => new ForbiddenException(body),
  [LedgerErrorCodes.invalidAuthorization]: (body) => new UnauthorizedException(body),
  [LedgerErrorCodes.remoteServiceUnavailable]: (body) => new ServiceUnavailableException(body),
};

/**
 * Rethrow an application error as the HTTP exception for its code, with the
 * error's JSON form as the body. Anything else propagates unchanged.
 */
export const rethrowAsHttp = (error: unknown): never => {
  if (error instanceof ApplicationError) {
    const factory = byCode[error.code];
    if (factory) {
      throw factory(error.toJSON());
    }
  }
  throw error;
};

export const withHttpErrors = async <T>(operation: () => Promise<T>): Promise<T> => {
  try {
    return await operation();
  } catch (error) {
    return rethrowAsHttp(error);
  }
};
