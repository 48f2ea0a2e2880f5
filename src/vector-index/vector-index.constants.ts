export const QDRANT_CLIENT = 'QDRANT_CLIENT';
export const CHUNK_REPOSITORY = 'CHUNK_REPOSITORY';
export const VECTOR_STORE = 'VECTOR_STORE';

// Must match the collection the search side queries
export const CHUNK_COLLECTION = 'document_chunks';

export const DEFAULT_INDEX_BATCH_SIZE = 100;
export const DEFAULT_SEARCH_RESULTS = 10;
