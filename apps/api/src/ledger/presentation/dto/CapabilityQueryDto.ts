import { IsString, Matches } from 'class-validator';

export class CapabilityQueryDto {
  @IsString()
  @Matches(/^0x[0-9a-fA-F]{40}$/, { message: 'principal must be a 20-byte hex address' })
  principal!: string;
}
