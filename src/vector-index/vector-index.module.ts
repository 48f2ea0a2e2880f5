import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { QdrantClient } from '@qdrant/js-client-rest';
import { EmbeddingModule } from '../embedding/embedding.module';
import { DocumentLockService } from './document-lock.service';
import { QdrantInitService } from './qdrant-init.service';
import { DrizzleChunkRepository } from './repositories/drizzle-chunk.repository';
import { QdrantVectorStore } from './stores/qdrant-vector.store';
import {
  CHUNK_REPOSITORY,
  QDRANT_CLIENT,
  VECTOR_STORE,
} from './vector-index.constants';
import { VectorIndexService } from './vector-index.service';

@Module({
  imports: [EmbeddingModule],
  providers: [
    {
      provide: QDRANT_CLIENT,
      useFactory: (configService: ConfigService): QdrantClient => {
        const url =
          configService.get<string>('QDRANT_URL') || 'http://localhost:6333';

        const apiKey = configService.get<string>('QDRANT_API_KEY');

        return new QdrantClient({
          url,
          ...(apiKey && { apiKey }),
        });
      },
      inject: [ConfigService],
    },
    { provide: CHUNK_REPOSITORY, useClass: DrizzleChunkRepository },
    { provide: VECTOR_STORE, useClass: QdrantVectorStore },
    QdrantInitService,
    DocumentLockService,
    VectorIndexService,
  ],
  exports: [VectorIndexService, DocumentLockService, QDRANT_CLIENT],
})
export class VectorIndexModule {}
