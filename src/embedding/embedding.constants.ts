export const EMBEDDINGS = 'EMBEDDINGS';

/** Character ceiling applied to every input before it reaches the provider */
export const MAX_EMBEDDING_INPUT_CHARS = 32_000;

/** Largest number of inputs sent in one provider call */
export const MAX_EMBEDDING_BATCH_SIZE = 2048;

export const DEFAULT_EMBEDDING_DIMENSIONS = 1536;

export type EmbeddingProviderName = 'openai' | 'ollama' | 'google';
