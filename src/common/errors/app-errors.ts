/**
 * Application error taxonomy
 *
 * Every error raised by the ingestion and retrieval pipeline extends AppError,
 * which carries a stable code and the HTTP status the transport maps it to.
 */

export enum AppErrorCode {
  NOT_FOUND = 'NOT_FOUND',
  UNSUPPORTED_FORMAT = 'UNSUPPORTED_FORMAT',
  PARSE_FAILED = 'PARSE_FAILED',
  CONFIGURATION = 'CONFIGURATION',
  EMBEDDING_PROVIDER = 'EMBEDDING_PROVIDER',
  GENERATION_PROVIDER = 'GENERATION_PROVIDER',
  VALIDATION = 'VALIDATION',
  STORAGE = 'STORAGE',
}

/**
 * Base application error
 */
export class AppError extends Error {
  constructor(
    public readonly code: AppErrorCode,
    message: string,
    public readonly statusCode: number = 500,
    public readonly originalError?: Error,
  ) {
    super(message);
    this.name = 'AppError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Missing file on disk or missing database record
 */
export class NotFoundError extends AppError {
  constructor(
    public readonly resource: string,
    public readonly identifier: string,
  ) {
    super(AppErrorCode.NOT_FOUND, `${resource} not found: ${identifier}`, 404);
    this.name = 'NotFoundError';
  }
}

/**
 * File extension with no extractor behind it
 */
export class UnsupportedFormatError extends AppError {
  constructor(public readonly extension: string) {
    super(
      AppErrorCode.UNSUPPORTED_FORMAT,
      `Unsupported file type: ${extension || 'unknown'}. Only .pdf, .docx and .doc are supported.`,
      415,
    );
    this.name = 'UnsupportedFormatError';
  }
}

export type ParseFailureReason =
  | 'corrupted'
  | 'password_protected'
  | 'unreadable';

/**
 * Decoder rejected the file content
 */
export class ParseError extends AppError {
  constructor(
    public readonly filePath: string,
    public readonly reason: ParseFailureReason,
    message: string,
    originalError?: Error,
  ) {
    super(AppErrorCode.PARSE_FAILED, message, 422, originalError);
    this.name = 'ParseError';
  }
}

/**
 * Invalid component configuration (e.g. chunk overlap >= chunk size)
 */
export class ConfigurationError extends AppError {
  constructor(message: string) {
    super(AppErrorCode.CONFIGURATION, message, 500);
    this.name = 'ConfigurationError';
  }
}

/**
 * Embedding call failed (transport, quota, malformed response)
 */
export class EmbeddingProviderError extends AppError {
  constructor(message: string, originalError?: Error) {
    super(AppErrorCode.EMBEDDING_PROVIDER, message, 502, originalError);
    this.name = 'EmbeddingProviderError';
  }
}

/**
 * Chat model call failed while drafting or extracting criteria
 */
export class GenerationProviderError extends AppError {
  constructor(message: string, originalError?: Error) {
    super(AppErrorCode.GENERATION_PROVIDER, message, 502, originalError);
    this.name = 'GenerationProviderError';
  }
}

/**
 * Rejected user input (upload checks, unknown section type)
 */
export class ValidationError extends AppError {
  constructor(message: string) {
    super(AppErrorCode.VALIDATION, message, 400);
    this.name = 'ValidationError';
  }
}

/**
 * Normalize an unknown thrown value into an Error
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
