/**
 * Vector Index Service
 *
 * Owns the chunk lifecycle of a document: replace chunks after a parse,
 * embed and store their vectors, answer similarity queries.
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ValidationError, toError } from '../common/errors';
import { isIndexCompletionPolicy } from '../config/env.validation';
import { EmbeddingBatcherService } from '../embedding/embedding-batcher.service';
import type { ChunkDraft } from '../ingestion/chunk/chunk.types';
import { DocumentLockService } from './document-lock.service';
import type { ChunkRepository } from './repositories/chunk.repository';
import type { VectorStore } from './stores/vector-store.interface';
import type {
  FailedChunk,
  IndexCompletionPolicy,
  IndexResult,
  SearchOptions,
  SearchResult,
} from './types';
import {
  CHUNK_REPOSITORY,
  DEFAULT_INDEX_BATCH_SIZE,
  DEFAULT_SEARCH_RESULTS,
  VECTOR_STORE,
} from './vector-index.constants';

@Injectable()
export class VectorIndexService {
  private readonly logger = new Logger(VectorIndexService.name);
  private readonly completionPolicy: IndexCompletionPolicy;

  constructor(
    @Inject(CHUNK_REPOSITORY) private readonly chunkRepository: ChunkRepository,
    @Inject(VECTOR_STORE) private readonly vectorStore: VectorStore,
    private readonly embeddingBatcher: EmbeddingBatcherService,
    private readonly documentLock: DocumentLockService,
    private readonly configService: ConfigService,
  ) {
    const policy = this.configService.get<string>(
      'INDEX_COMPLETION_POLICY',
      'strict',
    );
    this.completionPolicy = isIndexCompletionPolicy(policy) ? policy : 'strict';
  }

  /**
   * Replace the document's chunks. Rows are flagged unembedded before the
   * stale vectors go, so a failed replace never leaves a row claiming a
   * vector that no longer exists.
   * @returns number of chunks stored
   */
  async upsertChunks(documentId: string, drafts: ChunkDraft[]): Promise<number> {
    return this.documentLock.runExclusive(documentId, async () => {
      await this.chunkRepository.markDocumentUnindexed(documentId);
      await this.vectorStore.deleteByDocument(documentId);
      const inserted = await this.chunkRepository.replaceForDocument(
        documentId,
        drafts,
      );

      this.logger.log(`Stored ${inserted} chunks for document ${documentId}`);
      return inserted;
    });
  }

  /**
   * Embed every chunk of the document and store its vector.
   *
   * A failing embedding call aborts the run; a failing store of a single
   * vector is recorded and the loop moves on.
   */
  async index(
    documentId: string,
    batchSize: number = DEFAULT_INDEX_BATCH_SIZE,
  ): Promise<IndexResult> {
    if (!Number.isInteger(batchSize) || batchSize <= 0) {
      throw new ValidationError(
        `batchSize must be a positive integer, got ${batchSize}`,
      );
    }

    return this.documentLock.runExclusive(documentId, async () => {
      const startTime = Date.now();
      const chunks = await this.chunkRepository.findByDocument(documentId);

      if (chunks.length === 0) {
        this.logger.warn(`No chunks to index for document ${documentId}`);
        return {
          chunksIndexed: 0,
          embeddingsGenerated: 0,
          requested: 0,
          succeeded: [],
          failed: [],
          documentMarkedIndexed: false,
        };
      }

      const succeeded: string[] = [];
      const failed: FailedChunk[] = [];
      let embeddingsGenerated = 0;

      for (let i = 0; i < chunks.length; i += batchSize) {
        const batch = chunks.slice(i, i + batchSize);
        const vectors = await this.embeddingBatcher.embedMany(
          batch.map((chunk) => chunk.content),
        );
        embeddingsGenerated += vectors.length;

        for (const [offset, chunk] of batch.entries()) {
          try {
            await this.vectorStore.upsert({
              chunkId: chunk.id,
              documentId,
              content: chunk.content,
              metadata: chunk.metadata,
              vector: vectors[offset],
            });
            await this.chunkRepository.markEmbedded(chunk.id);
            succeeded.push(chunk.id);
          } catch (error) {
            const cause = toError(error);
            this.logger.error(
              `Failed to store vector for chunk ${chunk.id}: ${cause.message}`,
              cause.stack,
            );
            failed.push({ chunkId: chunk.id, error: cause.message });
          }
        }
      }

      const complete = failed.length === 0 && succeeded.length === chunks.length;
      const documentMarkedIndexed =
        this.completionPolicy === 'always' || complete;

      if (documentMarkedIndexed) {
        await this.chunkRepository.markDocumentIndexed(documentId);
      }

      this.logger.log(
        `Indexed document ${documentId}: ${succeeded.length}/${chunks.length} chunks, ` +
          `${failed.length} failed, marked indexed: ${documentMarkedIndexed} ` +
          `(${Date.now() - startTime}ms)`,
      );

      return {
        chunksIndexed: succeeded.length,
        embeddingsGenerated,
        requested: chunks.length,
        succeeded,
        failed,
        documentMarkedIndexed,
      };
    });
  }

  async search(
    queryText: string,
    options: SearchOptions = {},
  ): Promise<SearchResult[]> {
    const limit = options.nResults ?? DEFAULT_SEARCH_RESULTS;
    const threshold = options.similarityThreshold ?? 0;

    if (!Number.isInteger(limit) || limit <= 0) {
      throw new ValidationError(
        `nResults must be a positive integer, got ${limit}`,
      );
    }

    const vector = await this.embeddingBatcher.embedOne(queryText);
    const hits = await this.vectorStore.search({
      vector,
      limit,
      scoreThreshold: threshold,
      documentIds: options.documentIds,
    });

    // Array#sort is stable: equal scores keep the store's order
    return hits
      .map((hit) => ({
        id: hit.chunkId,
        content: hit.content,
        metadata: hit.metadata,
        similarity: hit.score,
        documentId: hit.documentId,
      }))
      .sort((a, b) => b.similarity - a.similarity);
  }

  async indexedChunkCount(documentId: string): Promise<number> {
    const counts = await this.chunkRepository.countByDocument(documentId);
    return counts.embedded;
  }

  async isFullyIndexed(documentId: string): Promise<boolean> {
    const counts = await this.chunkRepository.countByDocument(documentId);
    return counts.total > 0 && counts.embedded === counts.total;
  }

  /**
   * Drop every vector and chunk row of the document
   */
  async deleteDocument(documentId: string): Promise<void> {
    await this.documentLock.runExclusive(documentId, async () => {
      await this.chunkRepository.markDocumentUnindexed(documentId);
      await this.vectorStore.deleteByDocument(documentId);
      await this.chunkRepository.deleteByDocument(documentId);
    });
  }
}
