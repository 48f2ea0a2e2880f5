import { FileMetadata, StorageEntry } from './storage-metadata.interface';

/**
 * Blob store used for uploaded reference memoirs and RC files
 */
export interface StorageProvider {
  /**
   * Create the bucket when it does not exist yet
   */
  ensureBucket(): Promise<void>;

  /**
   * Write an object, overwriting any previous version
   * @returns the key the object was written under
   */
  putObject(key: string, body: Buffer, contentType?: string): Promise<string>;

  getObjectAsBuffer(key: string): Promise<Buffer>;

  deleteObjects(keys: string[]): Promise<void>;

  listObjects(prefix: string): Promise<StorageEntry[]>;

  getMetadata(key: string): Promise<FileMetadata>;

  objectExists(key: string): Promise<boolean>;
}
