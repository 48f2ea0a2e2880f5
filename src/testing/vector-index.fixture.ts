import { ConfigService } from '@nestjs/config';
import { EmbeddingBatcherService } from '../embedding/embedding-batcher.service';
import { DocumentLockService } from '../vector-index/document-lock.service';
import { VectorIndexService } from '../vector-index/vector-index.service';
import { FakeEmbeddings } from './fake-embeddings';
import { InMemoryChunkRepository } from './in-memory-chunk.repository';
import { InMemoryVectorStore } from './in-memory-vector.store';

export const TEST_KEYWORDS = [
  'béton',
  'sécurité',
  'planning',
  'environnement',
  'personnel',
  'matériel',
];

export interface VectorIndexFixture {
  config: ConfigService;
  embeddings: FakeEmbeddings;
  batcher: EmbeddingBatcherService;
  chunkRepository: InMemoryChunkRepository;
  vectorStore: InMemoryVectorStore;
  vectorIndex: VectorIndexService;
}

/**
 * VectorIndexService wired to in-process stand-ins
 */
export function createVectorIndexFixture(
  overrides: Record<string, unknown> = {},
): VectorIndexFixture {
  const config = new ConfigService({
    EMBEDDING_DIMENSIONS: TEST_KEYWORDS.length,
    ...overrides,
  });
  const embeddings = new FakeEmbeddings(TEST_KEYWORDS);
  const batcher = new EmbeddingBatcherService(embeddings, config);
  const chunkRepository = new InMemoryChunkRepository();
  const vectorStore = new InMemoryVectorStore();
  const vectorIndex = new VectorIndexService(
    chunkRepository,
    vectorStore,
    batcher,
    new DocumentLockService(),
    config,
  );

  return {
    config,
    embeddings,
    batcher,
    chunkRepository,
    vectorStore,
    vectorIndex,
  };
}
