import { Inject, Injectable, Logger } from '@nestjs/common';
import { and, asc, count, eq } from 'drizzle-orm';
import { v4 as uuidv4 } from 'uuid';
import { DATABASE_CONNECTION, type Database } from '../../database/database.module';
import { chunks, sourceDocuments, type NewChunkRow } from '../../database/schema';
import type { ChunkDraft } from '../../ingestion/chunk/chunk.types';
import type { ChunkCounts, StoredChunk } from '../types';
import type { ChunkRepository } from './chunk.repository';

const INSERT_BATCH_SIZE = 500;

@Injectable()
export class DrizzleChunkRepository implements ChunkRepository {
  private readonly logger = new Logger(DrizzleChunkRepository.name);

  constructor(
    @Inject(DATABASE_CONNECTION)
    private readonly db: Database,
  ) {}

  async replaceForDocument(
    documentId: string,
    drafts: ChunkDraft[],
  ): Promise<number> {
    // Drizzle transaction: auto-commit on success, auto-rollback on error
    return this.db.transaction(async (tx) => {
      await tx.delete(chunks).where(eq(chunks.documentId, documentId));

      const rows: NewChunkRow[] = drafts.map((draft) => ({
        id: uuidv4(),
        documentId,
        content: draft.content,
        chunkIndex: draft.chunkIndex,
        charStart: draft.charStart,
        charEnd: draft.charEnd,
        tokens: draft.tokens ?? 0,
        metadata: draft.metadata,
        embedded: false,
      }));

      for (let i = 0; i < rows.length; i += INSERT_BATCH_SIZE) {
        await tx.insert(chunks).values(rows.slice(i, i + INSERT_BATCH_SIZE));
      }

      await tx
        .update(sourceDocuments)
        .set({ parsed: true, indexed: false })
        .where(eq(sourceDocuments.id, documentId));

      this.logger.log(
        `Replaced chunks for document ${documentId}: ${rows.length} inserted`,
      );

      return rows.length;
    });
  }

  async findByDocument(documentId: string): Promise<StoredChunk[]> {
    const rows = await this.db
      .select()
      .from(chunks)
      .where(eq(chunks.documentId, documentId))
      .orderBy(asc(chunks.chunkIndex));

    return rows.map((row) => ({
      id: row.id,
      documentId: row.documentId,
      content: row.content,
      chunkIndex: row.chunkIndex,
      charStart: row.charStart,
      charEnd: row.charEnd,
      tokens: row.tokens,
      metadata: row.metadata,
      embedded: row.embedded,
    }));
  }

  async markEmbedded(chunkId: string): Promise<void> {
    await this.db
      .update(chunks)
      .set({ embedded: true })
      .where(eq(chunks.id, chunkId));
  }

  async countByDocument(documentId: string): Promise<ChunkCounts> {
    const [total] = await this.db
      .select({ value: count() })
      .from(chunks)
      .where(eq(chunks.documentId, documentId));

    const [embedded] = await this.db
      .select({ value: count() })
      .from(chunks)
      .where(and(eq(chunks.documentId, documentId), eq(chunks.embedded, true)));

    return {
      total: total?.value ?? 0,
      embedded: embedded?.value ?? 0,
    };
  }

  async markDocumentIndexed(documentId: string): Promise<void> {
    await this.db
      .update(sourceDocuments)
      .set({ indexed: true })
      .where(eq(sourceDocuments.id, documentId));
  }

  async markDocumentUnindexed(documentId: string): Promise<void> {
    await this.db.transaction(async (tx) => {
      await tx
        .update(chunks)
        .set({ embedded: false })
        .where(eq(chunks.documentId, documentId));
      await tx
        .update(sourceDocuments)
        .set({ indexed: false })
        .where(eq(sourceDocuments.id, documentId));
    });
  }

  async deleteByDocument(documentId: string): Promise<void> {
    await this.db.delete(chunks).where(eq(chunks.documentId, documentId));
  }
}
