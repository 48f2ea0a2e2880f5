import { Type } from 'class-transformer';
import { IsInt, IsOptional, Max, Min } from 'class-validator';

export class IndexDocumentDto {
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(2048)
  @IsOptional()
  batchSize?: number;
}
