/**
 * Ingestion Service
 *
 * blob → temp file → extraction → sliding-window chunks → chunk store,
 * then optionally embedding of the stored chunks
 */

import { Injectable, Logger } from '@nestjs/common';
import { DocumentsService } from '../documents/documents.service';
import { getFileExtension } from '../documents/utils/file-validation';
import type { IndexResult } from '../vector-index/types';
import { VectorIndexService } from '../vector-index/vector-index.service';
import { SlidingWindowChunker } from './chunk/sliding-window-chunker';
import { TokenCounterService } from './chunk/token-counter.service';
import { DocumentExtractorService } from './extract/document-extractor.service';
import type { ExtractionResult } from './extract/types';
import { TempFileService } from './temp/temp-file.service';

export interface ParseResult {
  documentId: string;
  chunksCreated: number;
  charCount: number;
  extraction: Omit<ExtractionResult, 'fullText'>;
}

export interface ParseAndIndexResult extends ParseResult {
  index: IndexResult;
}

@Injectable()
export class IngestionService {
  private readonly logger = new Logger(IngestionService.name);

  constructor(
    private readonly documentsService: DocumentsService,
    private readonly tempFileService: TempFileService,
    private readonly extractor: DocumentExtractorService,
    private readonly chunker: SlidingWindowChunker,
    private readonly tokenCounter: TokenCounterService,
    private readonly vectorIndex: VectorIndexService,
  ) {}

  /**
   * Extract and chunk a stored document, replacing its previous chunks.
   * Nothing is written when extraction or chunking fails.
   */
  async parseDocument(documentId: string): Promise<ParseResult> {
    const startTime = Date.now();
    const { document, bytes } = await this.documentsService.download(documentId);

    const extraction = await this.tempFileService.withTempFile(
      bytes,
      getFileExtension(document.filename),
      (filePath) => this.extractor.extract(filePath),
    );

    const drafts = this.chunker
      .chunk(extraction.fullText, {
        document_id: document.id,
        filename: document.filename,
        client: document.client,
        year: document.year,
      })
      .map((draft) => ({
        ...draft,
        tokens: this.tokenCounter.countTokens(draft.content),
      }));

    const chunksCreated = await this.vectorIndex.upsertChunks(
      document.id,
      drafts,
    );

    this.logger.log(
      `Parsed document ${document.id} (${document.filename}): ` +
        `${extraction.sections.length} sections, ${extraction.charCount} chars, ` +
        `${chunksCreated} chunks in ${Date.now() - startTime}ms`,
    );

    return {
      documentId: document.id,
      chunksCreated,
      charCount: extraction.charCount,
      extraction: {
        sections: extraction.sections,
        charCount: extraction.charCount,
        pageCount: extraction.pageCount,
        paragraphCount: extraction.paragraphCount,
        metadata: extraction.metadata,
      },
    };
  }

  async parseAndIndex(
    documentId: string,
    batchSize?: number,
  ): Promise<ParseAndIndexResult> {
    const parsed = await this.parseDocument(documentId);
    const index = await this.vectorIndex.index(documentId, batchSize);
    return { ...parsed, index };
  }

  async indexDocument(
    documentId: string,
    batchSize?: number,
  ): Promise<IndexResult> {
    await this.documentsService.findOne(documentId);
    return this.vectorIndex.index(documentId, batchSize);
  }

  async indexStatus(
    documentId: string,
  ): Promise<{ documentId: string; indexedChunks: number; fullyIndexed: boolean }> {
    await this.documentsService.findOne(documentId);
    const [indexedChunks, fullyIndexed] = await Promise.all([
      this.vectorIndex.indexedChunkCount(documentId),
      this.vectorIndex.isFullyIndexed(documentId),
    ]);
    return { documentId, indexedChunks, fullyIndexed };
  }
}
