import { Module } from '@nestjs/common';
import { StorageModule } from '../storage/storage.module';
import { VectorIndexModule } from '../vector-index/vector-index.module';
import { DocumentsController } from './documents.controller';
import { SOURCE_DOCUMENT_REPOSITORY } from './documents.constants';
import { DocumentsService } from './documents.service';
import { DrizzleSourceDocumentRepository } from './repositories/drizzle-source-document.repository';

@Module({
  imports: [StorageModule, VectorIndexModule],
  controllers: [DocumentsController],
  providers: [
    {
      provide: SOURCE_DOCUMENT_REPOSITORY,
      useClass: DrizzleSourceDocumentRepository,
    },
    DocumentsService,
  ],
  exports: [DocumentsService],
})
export class DocumentsModule {}
