import { CanActivate, ExecutionContext, Injectable, UnauthorizedException } from '@nestjs/common';
import type { Request } from 'express';
import { UserAddress } from '@cipherledger/domain';

export const PRINCIPAL_HEADER = 'x-principal';

/**
 * Trusts the caller address set by the authenticating gateway in front of
 * the API. Requests without a well-formed address are rejected.
 */
@Injectable()
export class PrincipalGuard implements CanActivate {
  canActivate(context: ExecutionContext): boolean {
    const request = context.switchToHttp().getRequest<Request>();
    const header = request.headers[PRINCIPAL_HEADER];
    const value = Array.isArray(header) ? header[0] : header;

    if (!value) {
      throw new UnauthorizedException('Principal header is required');
    }
    if (!UserAddress.isValid(value)) {
      throw new UnauthorizedException('Principal header must be a 20-byte hex address');
    }

    request.principal = UserAddress.from(value);
    return true;
  }
}
