import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { toNumber } from '../config/env.validation';
import { DocumentsModule } from '../documents/documents.module';
import { VectorIndexModule } from '../vector-index/vector-index.module';
import {
  DEFAULT_CHUNK_OVERLAP,
  DEFAULT_CHUNK_SIZE,
} from './chunk/chunk.types';
import { SlidingWindowChunker } from './chunk/sliding-window-chunker';
import { TokenCounterService } from './chunk/token-counter.service';
import { DocumentExtractorService } from './extract/document-extractor.service';
import { DocxParser } from './extract/parsers/docx.parser';
import { ParserFactory } from './extract/parsers/parser.factory';
import { PdfParser } from './extract/parsers/pdf.parser';
import { IngestionController } from './ingestion.controller';
import { IngestionService } from './ingestion.service';
import {
  FrequencyRepeatedLineDetector,
  REPEATED_LINE_DETECTOR,
} from './normalize/repeated-line.detector';
import { TextNormalizerService } from './normalize/text-normalizer.service';
import { TempFileService } from './temp/temp-file.service';

@Module({
  imports: [DocumentsModule, VectorIndexModule],
  controllers: [IngestionController],
  providers: [
    {
      provide: REPEATED_LINE_DETECTOR,
      useFactory: () => new FrequencyRepeatedLineDetector(),
    },
    TextNormalizerService,
    PdfParser,
    DocxParser,
    ParserFactory,
    DocumentExtractorService,
    {
      provide: SlidingWindowChunker,
      // Invalid sizes fail at startup with a ConfigurationError
      useFactory: (configService: ConfigService) =>
        new SlidingWindowChunker({
          chunkSize: toNumber(
            configService.get('CHUNK_SIZE'),
            DEFAULT_CHUNK_SIZE,
          ),
          chunkOverlap: toNumber(
            configService.get('CHUNK_OVERLAP'),
            DEFAULT_CHUNK_OVERLAP,
          ),
        }),
      inject: [ConfigService],
    },
    TokenCounterService,
    TempFileService,
    IngestionService,
  ],
  exports: [IngestionService, DocumentExtractorService, TempFileService],
})
export class IngestionModule {}
