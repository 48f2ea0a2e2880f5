/**
 * Qdrant Initialization Service
 * Creates the chunk collection and its payload index on startup
 */

import { Injectable, Logger, Inject, OnModuleInit } from '@nestjs/common';
import { QdrantClient } from '@qdrant/js-client-rest';
import { EmbeddingProviderFactory } from '../embedding/embedding-provider.factory';
import { CHUNK_COLLECTION, QDRANT_CLIENT } from './vector-index.constants';

@Injectable()
export class QdrantInitService implements OnModuleInit {
  private readonly logger = new Logger(QdrantInitService.name);
  private readonly vectorSize: number;

  constructor(
    @Inject(QDRANT_CLIENT) private readonly qdrantClient: QdrantClient,
    private readonly embeddingProviderFactory: EmbeddingProviderFactory,
  ) {
    this.vectorSize = this.embeddingProviderFactory.getEmbeddingDimensions();
  }

  async onModuleInit(): Promise<void> {
    this.logger.log(`Initializing Qdrant collection "${CHUNK_COLLECTION}"...`);

    try {
      await this.ensureCollectionExists();
    } catch (error: unknown) {
      const errorMessage =
        error instanceof Error ? error.message : 'Unknown error';
      this.logger.error(`Failed to initialize Qdrant collection: ${errorMessage}`);
      throw error;
    }
  }

  private async ensureCollectionExists(): Promise<void> {
    const { exists } = await this.qdrantClient.collectionExists(CHUNK_COLLECTION);
    if (exists) {
      this.logger.log(`Collection "${CHUNK_COLLECTION}" already exists`);
      return;
    }

    await this.qdrantClient.createCollection(CHUNK_COLLECTION, {
      vectors: {
        size: this.vectorSize,
        distance: 'Cosine',
      },
    });

    // documentId drives both re-parse deletes and search filters
    await this.qdrantClient.createPayloadIndex(CHUNK_COLLECTION, {
      field_name: 'documentId',
      field_schema: 'keyword',
      wait: true,
    });

    this.logger.log(
      `Created collection "${CHUNK_COLLECTION}" (${this.vectorSize}D, cosine)`,
    );
  }
}
