import { Type } from 'class-transformer';
import {
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  Max,
  MaxLength,
  Min,
} from 'class-validator';

export class UploadDocumentDto {
  @IsString()
  @IsNotEmpty()
  @MaxLength(255)
  @IsOptional()
  client?: string;

  @Type(() => Number)
  @IsInt()
  @Min(1900)
  @Max(2099)
  @IsOptional()
  year?: number;
}
