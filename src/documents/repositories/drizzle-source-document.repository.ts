import { Inject, Injectable } from '@nestjs/common';
import { desc, eq } from 'drizzle-orm';
import { DATABASE_CONNECTION, type Database } from '../../database/database.module';
import {
  sourceDocuments,
  type NewSourceDocument,
  type SourceDocument,
} from '../../database/schema';
import type { SourceDocumentRepository } from './source-document.repository';

@Injectable()
export class DrizzleSourceDocumentRepository
  implements SourceDocumentRepository
{
  constructor(
    @Inject(DATABASE_CONNECTION)
    private readonly db: Database,
  ) {}

  async create(document: NewSourceDocument): Promise<SourceDocument> {
    await this.db.insert(sourceDocuments).values(document);

    // Fetch the created row (MySQL doesn't support RETURNING)
    const created = await this.findById(document.id);
    if (!created) {
      throw new Error(`Source document ${document.id} was not persisted`);
    }
    return created;
  }

  async findById(id: string): Promise<SourceDocument | null> {
    const [document] = await this.db
      .select()
      .from(sourceDocuments)
      .where(eq(sourceDocuments.id, id))
      .limit(1);

    return document ?? null;
  }

  async findAll(): Promise<SourceDocument[]> {
    return this.db
      .select()
      .from(sourceDocuments)
      .orderBy(desc(sourceDocuments.createdAt));
  }

  async delete(id: string): Promise<void> {
    await this.db.delete(sourceDocuments).where(eq(sourceDocuments.id, id));
  }
}
