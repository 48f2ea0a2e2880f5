/**
 * Qdrant Vector Store
 * One point per chunk in the `document_chunks` collection (cosine)
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import { QdrantClient } from '@qdrant/js-client-rest';
import * as crypto from 'crypto';
import { isRecord, readString } from '../../common/utils';
import { CHUNK_COLLECTION, QDRANT_CLIENT } from '../vector-index.constants';
import type { VectorHit, VectorPoint, VectorQuery } from '../types';
import type { VectorStore } from './vector-store.interface';

/**
 * Deterministic UUID-shaped point id from a chunk id
 * (Qdrant only accepts UUIDs or unsigned integers)
 */
export function stringToUuid(str: string): string {
  const hash = crypto.createHash('md5').update(str).digest('hex');
  const variant = ((parseInt(hash.slice(16, 18), 16) & 0x3f) | 0x80).toString(16);
  return `${hash.slice(0, 8)}-${hash.slice(8, 12)}-4${hash.slice(13, 16)}-${variant}${hash.slice(18, 20)}-${hash.slice(20, 32)}`;
}

@Injectable()
export class QdrantVectorStore implements VectorStore {
  private readonly logger = new Logger(QdrantVectorStore.name);

  constructor(
    @Inject(QDRANT_CLIENT) private readonly qdrantClient: QdrantClient,
  ) {}

  async upsert(point: VectorPoint): Promise<void> {
    await this.qdrantClient.upsert(CHUNK_COLLECTION, {
      wait: true,
      points: [
        {
          id: stringToUuid(point.chunkId),
          vector: point.vector,
          payload: {
            chunkId: point.chunkId,
            documentId: point.documentId,
            content: point.content,
            metadata: point.metadata,
          },
        },
      ],
    });
  }

  async deleteByDocument(documentId: string): Promise<void> {
    await this.qdrantClient.delete(CHUNK_COLLECTION, {
      wait: true,
      filter: {
        must: [{ key: 'documentId', match: { value: documentId } }],
      },
    });
    this.logger.log(`Deleted vectors of document ${documentId}`);
  }

  async search(query: VectorQuery): Promise<VectorHit[]> {
    const documentIds = query.documentIds ?? [];

    const points = await this.qdrantClient.search(CHUNK_COLLECTION, {
      vector: query.vector,
      limit: query.limit,
      score_threshold: query.scoreThreshold,
      with_payload: true,
      ...(documentIds.length > 0 && {
        filter: {
          must: [{ key: 'documentId', match: { any: documentIds } }],
        },
      }),
    });

    return points
      .map((point) => {
        const payload = isRecord(point.payload) ? point.payload : undefined;
        const metadata: unknown = payload?.metadata;

        return {
          chunkId: readString(payload, 'chunkId') ?? String(point.id),
          documentId: readString(payload, 'documentId') ?? '',
          content: readString(payload, 'content') ?? '',
          metadata: isRecord(metadata) ? metadata : {},
          score: point.score,
        };
      })
      .filter((hit) => hit.score >= query.scoreThreshold);
  }
}
