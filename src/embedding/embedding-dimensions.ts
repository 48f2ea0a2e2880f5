import type { ConfigService } from '@nestjs/config';
import { toNumber } from '../config/env.validation';
import {
  DEFAULT_EMBEDDING_DIMENSIONS,
  type EmbeddingProviderName,
} from './embedding.constants';

export const DEFAULT_EMBEDDING_MODELS: Record<EmbeddingProviderName, string> = {
  openai: 'text-embedding-3-small',
  ollama: 'bge-m3',
  google: 'text-embedding-004',
};

// Native output size of the models we know about
const MODEL_DIMENSIONS: Record<string, number> = {
  // OpenAI
  'text-embedding-3-small': 1536,
  'text-embedding-3-large': 3072,
  'text-embedding-ada-002': 1536,
  // Ollama
  'bge-m3': 1024,
  'bge-m3:567m': 1024,
  'mxbai-embed-large': 1024,
  'nomic-embed-text': 768,
  // Google
  'text-embedding-004': 768,
  'embedding-001': 768,
};

export function isEmbeddingProviderName(
  value: string,
): value is EmbeddingProviderName {
  return value === 'openai' || value === 'ollama' || value === 'google';
}

export function resolveEmbeddingProvider(
  configService: ConfigService,
): EmbeddingProviderName {
  const provider = configService.get<string>('EMBEDDING_PROVIDER', 'openai');
  return isEmbeddingProviderName(provider) ? provider : 'openai';
}

export function resolveEmbeddingModel(
  configService: ConfigService,
  provider: EmbeddingProviderName,
): string {
  return configService.get<string>(
    `EMBEDDING_MODEL_${provider.toUpperCase()}`,
    DEFAULT_EMBEDDING_MODELS[provider],
  );
}

/** `EMBEDDING_DIMENSIONS` when set, else 0 */
export function configuredEmbeddingDimensions(
  configService: ConfigService,
): number {
  const value = Math.floor(
    toNumber(configService.get('EMBEDDING_DIMENSIONS'), 0),
  );
  return value > 0 ? value : 0;
}

/**
 * Vector size of the configured model: `EMBEDDING_DIMENSIONS` wins, then the
 * model's native size, then 1536 for models not listed above
 */
export function resolveEmbeddingDimensions(configService: ConfigService): number {
  const configured = configuredEmbeddingDimensions(configService);
  if (configured > 0) {
    return configured;
  }

  const model = resolveEmbeddingModel(
    configService,
    resolveEmbeddingProvider(configService),
  );
  return MODEL_DIMENSIONS[model] ?? DEFAULT_EMBEDDING_DIMENSIONS;
}
