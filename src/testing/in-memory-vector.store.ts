import type { VectorStore } from '../vector-index/stores/vector-store.interface';
import type { VectorHit, VectorPoint, VectorQuery } from '../vector-index/types';

export function cosineSimilarity(a: number[], b: number[]): number {
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }
  if (normA === 0 || normB === 0) {
    return 0;
  }
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

/**
 * Brute-force cosine search over points held in a Map
 */
export class InMemoryVectorStore implements VectorStore {
  readonly points = new Map<string, VectorPoint>();
  /** Chunk ids whose upsert should fail */
  readonly failingChunkIds = new Set<string>();

  async upsert(point: VectorPoint): Promise<void> {
    if (this.failingChunkIds.has(point.chunkId)) {
      throw new Error(`vector store rejected ${point.chunkId}`);
    }
    this.points.set(point.chunkId, point);
  }

  async deleteByDocument(documentId: string): Promise<void> {
    for (const [id, point] of this.points) {
      if (point.documentId === documentId) {
        this.points.delete(id);
      }
    }
  }

  async search(query: VectorQuery): Promise<VectorHit[]> {
    const documentIds = query.documentIds ?? [];

    return [...this.points.values()]
      .filter(
        (point) =>
          documentIds.length === 0 || documentIds.includes(point.documentId),
      )
      .map((point) => ({
        chunkId: point.chunkId,
        documentId: point.documentId,
        content: point.content,
        metadata: point.metadata,
        score: cosineSimilarity(query.vector, point.vector),
      }))
      .filter((hit) => hit.score >= query.scoreThreshold)
      .sort((a, b) => b.score - a.score)
      .slice(0, query.limit);
  }
}
