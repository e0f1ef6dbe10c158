import { IsArray, IsString } from 'class-validator';

export class ValidateBatchDto {
  @IsArray()
  @IsString({ each: true })
  handles!: string[];

  @IsArray()
  @IsString({ each: true })
  inputProofs!: string[];
}
