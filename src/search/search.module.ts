import { Module } from '@nestjs/common';
import { VectorIndexModule } from '../vector-index/vector-index.module';
import { SearchController } from './search.controller';

@Module({
  imports: [VectorIndexModule],
  controllers: [SearchController],
})
export class SearchModule {}
