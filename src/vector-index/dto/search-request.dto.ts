import { IsNotEmpty, IsString, MaxLength } from 'class-validator';
import { SearchOptionsDto } from './search-options.dto';

export class SearchRequestDto extends SearchOptionsDto {
  @IsString()
  @IsNotEmpty()
  @MaxLength(8000)
  query!: string;
}
