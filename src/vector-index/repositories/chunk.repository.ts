import type { ChunkDraft } from '../../ingestion/chunk/chunk.types';
import type { ChunkCounts, StoredChunk } from '../types';

/**
 * Relational side of the index: chunk rows and the document's
 * parsed / indexed flags
 */
export interface ChunkRepository {
  /**
   * Atomically replace every chunk of the document and flag it
   * parsed (and not indexed)
   * @returns number of rows inserted
   */
  replaceForDocument(documentId: string, drafts: ChunkDraft[]): Promise<number>;

  /** Ordered by chunk index */
  findByDocument(documentId: string): Promise<StoredChunk[]>;

  markEmbedded(chunkId: string): Promise<void>;

  countByDocument(documentId: string): Promise<ChunkCounts>;

  markDocumentIndexed(documentId: string): Promise<void>;

  /** Clear every chunk's embedded flag and the document's indexed flag */
  markDocumentUnindexed(documentId: string): Promise<void>;

  deleteByDocument(documentId: string): Promise<void>;
}
