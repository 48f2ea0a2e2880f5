/**
 * Embedding Provider Factory
 * Multi-provider support: OpenAI (default), Ollama, Google
 */

import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { OllamaEmbeddings } from '@langchain/ollama';
import { OpenAIEmbeddings } from '@langchain/openai';
import { GoogleGenerativeAIEmbeddings } from '@langchain/google-genai';
import type { Embeddings } from '@langchain/core/embeddings';
import { ConfigurationError } from '../common/errors';
import {
  configuredEmbeddingDimensions,
  isEmbeddingProviderName,
  resolveEmbeddingDimensions,
  resolveEmbeddingModel,
} from './embedding-dimensions';
import {
  MAX_EMBEDDING_BATCH_SIZE,
  type EmbeddingProviderName,
} from './embedding.constants';

@Injectable()
export class EmbeddingProviderFactory {
  private readonly logger = new Logger(EmbeddingProviderFactory.name);

  constructor(private readonly configService: ConfigService) {}

  /**
   * Create embedding model based on configuration
   */
  createEmbeddingModel(): Embeddings {
    const provider = this.getProvider();
    const model = this.getModel(provider);

    this.logger.log(
      `Creating embedding model: ${provider}/${model} (${this.getEmbeddingDimensions()}D)`,
    );

    switch (provider) {
      case 'ollama':
        return this.createOllamaEmbeddings(model);
      case 'openai':
        return this.createOpenAIEmbeddings(model);
      case 'google':
        return this.createGoogleEmbeddings(model);
    }
  }

  /**
   * Vector size the collection is created with and responses are checked against
   */
  getEmbeddingDimensions(): number {
    return resolveEmbeddingDimensions(this.configService);
  }

  private getProvider(): EmbeddingProviderName {
    const provider = this.configService.get<string>(
      'EMBEDDING_PROVIDER',
      'openai',
    );

    if (!isEmbeddingProviderName(provider)) {
      this.logger.warn(
        `Invalid embedding provider: ${provider}, defaulting to openai`,
      );
      return 'openai';
    }

    return provider;
  }

  private getModel(provider: EmbeddingProviderName): string {
    return resolveEmbeddingModel(this.configService, provider);
  }

  private createOllamaEmbeddings(model: string): OllamaEmbeddings {
    const baseUrl = this.configService.get<string>(
      'OLLAMA_BASE_URL',
      'http://localhost:11434',
    );

    return new OllamaEmbeddings({
      model,
      baseUrl,
    });
  }

  private createOpenAIEmbeddings(model: string): OpenAIEmbeddings {
    const apiKey = this.configService.get<string>('OPENAI_API_KEY');

    if (!apiKey) {
      throw new ConfigurationError(
        'OPENAI_API_KEY is required for OpenAI embeddings',
      );
    }

    // Only the text-embedding-3 models accept a shortened output size
    const dimensions = configuredEmbeddingDimensions(this.configService);

    return new OpenAIEmbeddings({
      model,
      apiKey,
      ...(dimensions > 0 && { dimensions }),
      // One request per batch handed over by EmbeddingBatcherService
      batchSize: MAX_EMBEDDING_BATCH_SIZE,
    });
  }

  private createGoogleEmbeddings(model: string): GoogleGenerativeAIEmbeddings {
    const apiKey = this.configService.get<string>('GOOGLE_API_KEY');

    if (!apiKey) {
      throw new ConfigurationError(
        'GOOGLE_API_KEY is required for Google embeddings',
      );
    }

    return new GoogleGenerativeAIEmbeddings({
      model,
      apiKey,
    });
  }
}
