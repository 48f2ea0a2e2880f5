/**
 * Embedding Batcher Service
 * Truncates inputs, splits them into provider-sized batches issued one after
 * another, and checks every response against the configured dimension.
 * No caching, no retries.
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { Embeddings } from '@langchain/core/embeddings';
import { EmbeddingProviderError, toError } from '../common/errors';
import { resolveEmbeddingDimensions } from './embedding-dimensions';
import {
  EMBEDDINGS,
  MAX_EMBEDDING_BATCH_SIZE,
  MAX_EMBEDDING_INPUT_CHARS,
} from './embedding.constants';

@Injectable()
export class EmbeddingBatcherService {
  private readonly logger = new Logger(EmbeddingBatcherService.name);
  private readonly dimensions: number;

  constructor(
    @Inject(EMBEDDINGS) private readonly embeddings: Embeddings,
    private readonly configService: ConfigService,
  ) {
    this.dimensions = resolveEmbeddingDimensions(this.configService);
  }

  async embedOne(text: string): Promise<number[]> {
    let vector: number[];
    try {
      vector = await this.embeddings.embedQuery(this.truncate(text));
    } catch (error) {
      throw this.wrapProviderError('Query embedding request failed', error);
    }

    this.assertDimension(vector, 0);
    return vector;
  }

  async embedMany(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }

    const batches = this.createBatches(
      texts.map((text) => this.truncate(text)),
      MAX_EMBEDDING_BATCH_SIZE,
    );
    const vectors: number[][] = [];

    for (const [index, batch] of batches.entries()) {
      const batchNum = index + 1;
      this.logger.debug(
        `Embedding batch ${batchNum}/${batches.length} (${batch.length} texts)`,
      );

      let batchVectors: number[][];
      try {
        batchVectors = await this.embeddings.embedDocuments(batch);
      } catch (error) {
        throw this.wrapProviderError(
          `Embedding request failed for batch ${batchNum}/${batches.length}`,
          error,
        );
      }

      if (batchVectors.length !== batch.length) {
        throw new EmbeddingProviderError(
          `Embedding provider returned ${batchVectors.length} vectors for ${batch.length} inputs`,
        );
      }

      batchVectors.forEach((vector, offset) =>
        this.assertDimension(vector, vectors.length + offset),
      );
      vectors.push(...batchVectors);
    }

    this.logger.log(
      `Generated ${vectors.length} embeddings in ${batches.length} batch(es)`,
    );

    return vectors;
  }

  private truncate(text: string): string {
    return text.length > MAX_EMBEDDING_INPUT_CHARS
      ? text.slice(0, MAX_EMBEDDING_INPUT_CHARS)
      : text;
  }

  private createBatches<T>(items: T[], batchSize: number): T[][] {
    const batches: T[][] = [];

    for (let i = 0; i < items.length; i += batchSize) {
      batches.push(items.slice(i, i + batchSize));
    }

    return batches;
  }

  private assertDimension(vector: number[], position: number): void {
    if (vector.length !== this.dimensions) {
      throw new EmbeddingProviderError(
        `Embedding ${position} has ${vector.length} dimensions, expected ${this.dimensions}`,
      );
    }
  }

  private wrapProviderError(
    message: string,
    error: unknown,
  ): EmbeddingProviderError {
    const cause = toError(error);
    this.logger.error(`${message}: ${cause.message}`, cause.stack);
    return new EmbeddingProviderError(`${message}: ${cause.message}`, cause);
  }
}
