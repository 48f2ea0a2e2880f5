import { Body, Controller, Get, Param, ParseUUIDPipe, Post } from '@nestjs/common';
import { IndexDocumentDto } from './dto/index-document.dto';
import { IngestionService } from './ingestion.service';

@Controller('documents')
export class IngestionController {
  constructor(private readonly ingestionService: IngestionService) {}

  @Post(':id/parse')
  parse(@Param('id', ParseUUIDPipe) id: string) {
    return this.ingestionService.parseDocument(id);
  }

  @Post(':id/index')
  index(
    @Param('id', ParseUUIDPipe) id: string,
    @Body() indexDocumentDto: IndexDocumentDto,
  ) {
    return this.ingestionService.indexDocument(id, indexDocumentDto.batchSize);
  }

  @Post(':id/ingest')
  ingest(
    @Param('id', ParseUUIDPipe) id: string,
    @Body() indexDocumentDto: IndexDocumentDto,
  ) {
    return this.ingestionService.parseAndIndex(id, indexDocumentDto.batchSize);
  }

  @Get(':id/index-status')
  indexStatus(@Param('id', ParseUUIDPipe) id: string) {
    return this.ingestionService.indexStatus(id);
  }
}
