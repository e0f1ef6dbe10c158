import { Type } from 'class-transformer';
import { IsInt } from 'class-validator';

export class RangeQueryDto {
  @Type(() => Number)
  @IsInt()
  start!: number;

  @Type(() => Number)
  @IsInt()
  end!: number;
}
