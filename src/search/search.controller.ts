import { Body, Controller, HttpCode, HttpStatus, Post } from '@nestjs/common';
import { SearchRequestDto } from '../vector-index/dto';
import { VectorIndexService } from '../vector-index/vector-index.service';

@Controller('search')
export class SearchController {
  constructor(private readonly vectorIndex: VectorIndexService) {}

  @Post()
  @HttpCode(HttpStatus.OK)
  async search(@Body() searchRequestDto: SearchRequestDto) {
    const { query, ...options } = searchRequestDto;
    const results = await this.vectorIndex.search(query, options);
    return { query, results, total: results.length };
  }
}
