import { Module } from '@nestjs/common';
import type { Embeddings } from '@langchain/core/embeddings';
import { EmbeddingBatcherService } from './embedding-batcher.service';
import { EmbeddingProviderFactory } from './embedding-provider.factory';
import { EMBEDDINGS } from './embedding.constants';

@Module({
  providers: [
    EmbeddingProviderFactory,
    {
      provide: EMBEDDINGS,
      useFactory: (factory: EmbeddingProviderFactory): Embeddings =>
        factory.createEmbeddingModel(),
      inject: [EmbeddingProviderFactory],
    },
    EmbeddingBatcherService,
  ],
  exports: [EmbeddingBatcherService, EmbeddingProviderFactory],
})
export class EmbeddingModule {}
