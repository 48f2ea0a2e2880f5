import type { IndexCompletionPolicy } from '../../config/env.validation';

export type { IndexCompletionPolicy };

/**
 * Persisted chunk as read back from the relational store
 */
export interface StoredChunk {
  id: string;
  documentId: string;
  content: string;
  chunkIndex: number;
  charStart: number;
  charEnd: number;
  tokens: number;
  metadata: Record<string, unknown>;
  embedded: boolean;
}

export interface ChunkCounts {
  total: number;
  embedded: number;
}

/**
 * Vector plus the payload stored beside it
 */
export interface VectorPoint {
  chunkId: string;
  documentId: string;
  content: string;
  metadata: Record<string, unknown>;
  vector: number[];
}

export interface VectorQuery {
  vector: number[];
  limit: number;
  scoreThreshold: number;
  /** Restrict to these documents when non-empty */
  documentIds?: string[];
}

export interface VectorHit {
  chunkId: string;
  documentId: string;
  content: string;
  metadata: Record<string, unknown>;
  score: number;
}

export interface SearchOptions {
  documentIds?: string[];
  nResults?: number;
  similarityThreshold?: number;
}

export interface SearchResult {
  id: string;
  content: string;
  metadata: Record<string, unknown>;
  similarity: number;
  documentId: string;
}

export interface FailedChunk {
  chunkId: string;
  error: string;
}

export interface IndexResult {
  /** Chunks whose vector was stored and flagged embedded */
  chunksIndexed: number;
  /** Vectors returned by the embedding provider */
  embeddingsGenerated: number;
  /** Chunks found for the document */
  requested: number;
  succeeded: string[];
  failed: FailedChunk[];
  documentMarkedIndexed: boolean;
}
