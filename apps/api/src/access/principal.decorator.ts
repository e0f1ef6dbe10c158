import { createParamDecorator, ExecutionContext, UnauthorizedException } from '@nestjs/common';
import type { Request } from 'express';
import type { UserAddress } from '@cipherledger/domain';

export const Principal = createParamDecorator((_data: unknown, ctx: ExecutionContext): UserAddress => {
  const request = ctx.switchToHttp().getRequest<Request>();
  if (!request.principal) {
    throw new UnauthorizedException('Principal missing');
  }
  return request.principal;
});
