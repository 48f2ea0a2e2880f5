/**
 * A chunk before it is persisted; ids are assigned by the repository
 */
export interface ChunkDraft {
  content: string;
  chunkIndex: number;
  /** Offsets into the cleaned full text, end exclusive, untrimmed */
  charStart: number;
  charEnd: number;
  tokens?: number;
  metadata: Record<string, unknown>;
}

export interface ChunkerOptions {
  chunkSize: number;
  chunkOverlap: number;
}

export const DEFAULT_CHUNK_SIZE = 500;
export const DEFAULT_CHUNK_OVERLAP = 100;
