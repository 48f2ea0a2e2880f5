import { AppError, AppErrorCode } from '../../common/errors';

/**
 * Blob store failure. Defaults to 503: the store is a remote dependency.
 */
export class StorageError extends AppError {
  constructor(
    message: string,
    statusCode: number = 503,
    originalError?: Error,
  ) {
    super(AppErrorCode.STORAGE, message, statusCode, originalError);
    this.name = 'StorageError';
  }
}

export class FileNotFoundError extends StorageError {
  constructor(public readonly key: string) {
    super(`Stored object not found: ${key}`, 404);
    this.name = 'FileNotFoundError';
  }
}

export class AccessDeniedError extends StorageError {
  constructor(public readonly key: string) {
    super(`Access denied to stored object: ${key}`, 403);
    this.name = 'AccessDeniedError';
  }
}
