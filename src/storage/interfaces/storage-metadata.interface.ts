export interface FileMetadata {
  contentLength: number;
  contentType: string | null;
  etag: string | null;
  lastModified: Date | null;
}

export interface StorageEntry {
  key: string;
  size: number;
  lastModified: Date | null;
}
