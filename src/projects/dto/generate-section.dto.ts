import { IsNotEmpty, IsString, MaxLength } from 'class-validator';
import { SearchOptionsDto } from '../../vector-index/dto';

export class GenerateSectionDto extends SearchOptionsDto {
  @IsString()
  @IsNotEmpty()
  @MaxLength(64)
  sectionType!: string;
}
