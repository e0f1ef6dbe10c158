import { Type } from 'class-transformer';
import {
  ArrayNotEmpty,
  IsArray,
  IsBase64,
  IsInt,
  IsString,
  Min,
  ValidateNested,
} from 'class-validator';

export class DecryptionAuthorizationDto {
  @IsBase64()
  sessionPublicKey!: string;

  @IsArray()
  @ArrayNotEmpty()
  @IsString({ each: true })
  systemAddresses!: string[];

  @IsInt()
  @Min(0)
  startTimestamp!: number;

  @IsInt()
  durationDays!: number;
}

export class UserDecryptDto {
  @IsArray()
  @ArrayNotEmpty()
  @IsString({ each: true })
  handles!: string[];

  @IsString()
  user!: string;

  @IsBase64()
  signerPublicKey!: string;

  @IsBase64()
  signature!: string;

  @ValidateNested()
  @Type(() => DecryptionAuthorizationDto)
  authorization!: DecryptionAuthorizationDto;
}
