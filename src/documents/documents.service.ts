import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { v4 as uuidv4 } from 'uuid';
import { NotFoundError, ValidationError, toError } from '../common/errors';
import { toNumber } from '../config/env.validation';
import type { SourceDocument } from '../database/schema';
import { StorageService } from '../storage/storage.service';
import { VectorIndexService } from '../vector-index/vector-index.service';
import { SOURCE_DOCUMENT_REPOSITORY } from './documents.constants';
import type { SourceDocumentRepository } from './repositories/source-document.repository';
import {
  DEFAULT_MAX_FILE_SIZE_MB,
  extractYearFromFilename,
  formatFileSize,
  generateStoragePath,
  validateFileSize,
  validateFileType,
} from './utils/file-validation';

export interface UploadOptions {
  client?: string;
  year?: number;
}

@Injectable()
export class DocumentsService {
  private readonly logger = new Logger(DocumentsService.name);
  private readonly maxFileSizeMb: number;

  constructor(
    @Inject(SOURCE_DOCUMENT_REPOSITORY)
    private readonly repository: SourceDocumentRepository,
    private readonly storageService: StorageService,
    private readonly vectorIndex: VectorIndexService,
    private readonly configService: ConfigService,
  ) {
    this.maxFileSizeMb = toNumber(
      this.configService.get('MAX_FILE_SIZE_MB'),
      DEFAULT_MAX_FILE_SIZE_MB,
    );
  }

  /**
   * Store the bytes in the blob store and register the document
   */
  async upload(
    filename: string,
    bytes: Buffer,
    options: UploadOptions = {},
  ): Promise<SourceDocument> {
    for (const check of [
      validateFileType(filename),
      validateFileSize(bytes.length, this.maxFileSizeMb),
    ]) {
      if (!check.valid) {
        throw new ValidationError(check.error ?? 'Invalid file');
      }
    }

    const storagePath = generateStoragePath(filename);
    await this.storageService.put(storagePath, bytes);

    let document: SourceDocument;
    try {
      document = await this.repository.create({
        id: uuidv4(),
        filename,
        storagePath,
        client: options.client ?? null,
        year: options.year ?? extractYearFromFilename(filename),
        parsed: false,
        indexed: false,
      });
    } catch (error) {
      await this.discardBlob(storagePath);
      throw error;
    }

    this.logger.log(
      `Uploaded ${filename} (${formatFileSize(bytes.length)}) as document ${document.id}`,
    );

    return document;
  }

  // Best effort: the insert failure is what the caller sees
  private async discardBlob(storagePath: string): Promise<void> {
    try {
      await this.storageService.delete([storagePath]);
    } catch (error) {
      this.logger.warn(
        `Failed to remove orphaned object ${storagePath}: ${toError(error).message}`,
      );
    }
  }

  async findOne(id: string): Promise<SourceDocument> {
    const document = await this.repository.findById(id);
    if (!document) {
      throw new NotFoundError('Document', id);
    }
    return document;
  }

  async findAll(): Promise<SourceDocument[]> {
    return this.repository.findAll();
  }

  /**
   * Delete vectors, chunk rows, the record and the stored file
   */
  async remove(id: string): Promise<{ id: string; deleted: true }> {
    const document = await this.findOne(id);

    await this.vectorIndex.deleteDocument(id);
    await this.repository.delete(id);
    await this.storageService.delete([document.storagePath]);

    this.logger.log(`Removed document ${id} (${document.filename})`);
    return { id, deleted: true };
  }

  async download(id: string): Promise<{ document: SourceDocument; bytes: Buffer }> {
    const document = await this.findOne(id);
    const bytes = await this.storageService.get(document.storagePath);
    return { document, bytes };
  }
}
