import { Module } from '@nestjs/common';
import { PrincipalGuard } from './guards/principal.guard';

@Module({
  providers: [PrincipalGuard],
  exports: [PrincipalGuard],
})
export class AccessModule {}
