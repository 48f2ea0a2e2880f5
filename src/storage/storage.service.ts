import { Injectable, OnModuleInit, Logger, Inject } from '@nestjs/common';
import type { StorageProvider, StorageEntry } from './interfaces';
import { STORAGE_PROVIDER } from './storage.provider.factory';

/**
 * StorageService
 * Blob access for uploaded memoirs and RC documents
 */
@Injectable()
export class StorageService implements OnModuleInit {
  private readonly logger = new Logger(StorageService.name);

  constructor(
    @Inject(STORAGE_PROVIDER)
    private readonly storageProvider: StorageProvider,
  ) {}

  async onModuleInit(): Promise<void> {
    try {
      await this.storageProvider.ensureBucket();
      this.logger.log('Storage bucket validated successfully');
    } catch (error) {
      const errorMessage =
        error instanceof Error ? error.message : 'Unknown error';
      this.logger.error(`Failed to validate storage bucket: ${errorMessage}`);
      throw error;
    }
  }

  /**
   * Upload bytes under the given path
   * @returns the stored path
   */
  async put(path: string, bytes: Buffer, contentType?: string): Promise<string> {
    this.logger.log(`Uploading ${path} (${bytes.length} bytes)`);
    return this.storageProvider.putObject(
      path,
      bytes,
      contentType ?? this.contentTypeFor(path),
    );
  }

  async get(path: string): Promise<Buffer> {
    this.logger.log(`Fetching file as buffer: ${path}`);
    return this.storageProvider.getObjectAsBuffer(path);
  }

  async delete(paths: string[]): Promise<void> {
    await this.storageProvider.deleteObjects(paths);
  }

  async list(prefix: string): Promise<StorageEntry[]> {
    return this.storageProvider.listObjects(prefix);
  }

  async exists(path: string): Promise<boolean> {
    return this.storageProvider.objectExists(path);
  }

  private contentTypeFor(path: string): string {
    const lower = path.toLowerCase();

    if (lower.endsWith('.pdf')) {
      return 'application/pdf';
    }
    if (lower.endsWith('.docx')) {
      return 'application/vnd.openxmlformats-officedocument.wordprocessingml.document';
    }
    if (lower.endsWith('.doc')) {
      return 'application/msword';
    }
    return 'application/octet-stream';
  }
}
