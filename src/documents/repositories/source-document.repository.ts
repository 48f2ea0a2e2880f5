import type { NewSourceDocument, SourceDocument } from '../../database/schema';

export interface SourceDocumentRepository {
  create(document: NewSourceDocument): Promise<SourceDocument>;
  findById(id: string): Promise<SourceDocument | null>;
  /** Newest first */
  findAll(): Promise<SourceDocument[]>;
  delete(id: string): Promise<void>;
}
