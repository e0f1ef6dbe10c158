import { IsBase64, IsString, ValidateIf } from 'class-validator';

export class RecordEventDto {
  @IsString()
  handle!: string;

  /** Base64. An empty string reaches the ledger and is rejected there. */
  @IsString()
  @ValidateIf((dto: RecordEventDto) => dto.inputProof !== '')
  @IsBase64()
  inputProof!: string;
}
