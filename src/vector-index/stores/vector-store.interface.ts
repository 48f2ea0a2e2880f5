import type { VectorHit, VectorPoint, VectorQuery } from '../types';

export interface VectorStore {
  upsert(point: VectorPoint): Promise<void>;
  deleteByDocument(documentId: string): Promise<void>;
  /** Hits with score >= threshold, best first */
  search(query: VectorQuery): Promise<VectorHit[]>;
}
