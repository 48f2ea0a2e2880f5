import {
  S3Client,
  HeadBucketCommand,
  CreateBucketCommand,
  PutObjectCommand,
  GetObjectCommand,
  DeleteObjectsCommand,
  HeadObjectCommand,
  ListObjectsV2Command,
  NotFound,
  NoSuchKey,
} from '@aws-sdk/client-s3';
import { Logger } from '@nestjs/common';
import type { FileMetadata, StorageEntry, StorageProvider } from '../interfaces';
import { toError } from '../../common/errors';
import { AccessDeniedError, FileNotFoundError, StorageError } from '../errors';

export interface S3StorageOptions {
  /** Full endpoint URL, e.g. http://localhost:9000 */
  endpoint: string;
  region: string;
  accessKeyId: string;
  secretAccessKey: string;
  bucket: string;
  /** MinIO and most S3-compatible stores need path-style URLs */
  forcePathStyle: boolean;
}

export class S3StorageProvider implements StorageProvider {
  private readonly logger = new Logger(S3StorageProvider.name);
  private readonly s3Client: S3Client;
  private readonly bucket: string;

  constructor(options: S3StorageOptions) {
    this.bucket = options.bucket;

    this.s3Client = new S3Client({
      endpoint: options.endpoint,
      region: options.region,
      credentials: {
        accessKeyId: options.accessKeyId,
        secretAccessKey: options.secretAccessKey,
      },
      forcePathStyle: options.forcePathStyle,
    });

    this.logger.log(`S3 storage at ${options.endpoint}, bucket ${this.bucket}`);
  }

  async ensureBucket(): Promise<void> {
    try {
      await this.s3Client.send(new HeadBucketCommand({ Bucket: this.bucket }));
      this.logger.log(`Bucket ${this.bucket} already exists`);
    } catch (error) {
      if (error instanceof Error && error.name === 'NotFound') {
        try {
          await this.s3Client.send(
            new CreateBucketCommand({ Bucket: this.bucket }),
          );
          this.logger.log(`Bucket ${this.bucket} created successfully`);
        } catch (createError) {
          this.logger.error(
            `Failed to create bucket ${this.bucket}`,
            createError,
          );
          throw new StorageError(
            `Failed to create bucket: ${createError instanceof Error ? createError.message : 'Unknown error'}`,
          );
        }
      } else {
        this.logger.error(`Failed to check bucket ${this.bucket}`, error);
        throw new StorageError(
          `Failed to check bucket: ${error instanceof Error ? error.message : 'Unknown error'}`,
        );
      }
    }
  }

  async putObject(
    key: string,
    body: Buffer,
    contentType?: string,
  ): Promise<string> {
    try {
      await this.s3Client.send(
        new PutObjectCommand({
          Bucket: this.bucket,
          Key: key,
          Body: body,
          ContentType: contentType ?? 'application/octet-stream',
        }),
      );

      this.logger.log(`Stored object: ${key} (${body.length} bytes)`);
      return key;
    } catch (error) {
      this.logger.error(`Failed to put object ${key}`, error);
      throw this.mapError(error, key, 'put object');
    }
  }

  async getObjectAsBuffer(key: string): Promise<Buffer> {
    try {
      const response = await this.s3Client.send(
        new GetObjectCommand({ Bucket: this.bucket, Key: key }),
      );

      if (!response.Body) {
        throw new FileNotFoundError(key);
      }

      const bytes = await response.Body.transformToByteArray();
      const buffer = Buffer.from(bytes);

      this.logger.log(
        `Successfully fetched file as buffer: ${key} (${buffer.length} bytes)`,
      );

      return buffer;
    } catch (error) {
      this.logger.error(`Failed to get object as buffer ${key}`, error);
      throw this.mapError(error, key, 'get object as buffer');
    }
  }

  async deleteObjects(keys: string[]): Promise<void> {
    if (keys.length === 0) {
      return;
    }

    try {
      await this.s3Client.send(
        new DeleteObjectsCommand({
          Bucket: this.bucket,
          Delete: {
            Objects: keys.map((key) => ({ Key: key })),
            Quiet: true,
          },
        }),
      );
      this.logger.log(`Deleted ${keys.length} object(s)`);
    } catch (error) {
      this.logger.error(`Failed to delete objects ${keys.join(', ')}`, error);
      throw this.mapError(error, keys.join(', '), 'delete objects');
    }
  }

  async listObjects(prefix: string): Promise<StorageEntry[]> {
    const entries: StorageEntry[] = [];
    let continuationToken: string | undefined;

    try {
      do {
        const response = await this.s3Client.send(
          new ListObjectsV2Command({
            Bucket: this.bucket,
            Prefix: prefix,
            ContinuationToken: continuationToken,
          }),
        );

        for (const object of response.Contents ?? []) {
          if (object.Key) {
            entries.push({
              key: object.Key,
              size: object.Size ?? 0,
              lastModified: object.LastModified ?? null,
            });
          }
        }

        continuationToken = response.IsTruncated
          ? response.NextContinuationToken
          : undefined;
      } while (continuationToken);

      return entries;
    } catch (error) {
      this.logger.error(`Failed to list objects under ${prefix}`, error);
      throw this.mapError(error, prefix, 'list objects');
    }
  }

  async getMetadata(key: string): Promise<FileMetadata> {
    try {
      const response = await this.s3Client.send(
        new HeadObjectCommand({ Bucket: this.bucket, Key: key }),
      );

      return {
        contentLength: response.ContentLength ?? 0,
        contentType: response.ContentType ?? null,
        etag: response.ETag ?? null,
        lastModified: response.LastModified ?? null,
      };
    } catch (error) {
      this.logger.error(`Failed to get metadata for ${key}`, error);
      throw this.mapError(error, key, 'get metadata');
    }
  }

  async objectExists(key: string): Promise<boolean> {
    try {
      await this.getMetadata(key);
      return true;
    } catch (error) {
      if (error instanceof FileNotFoundError) {
        return false;
      }
      throw error;
    }
  }

  private mapError(error: unknown, key: string, action: string): Error {
    if (error instanceof StorageError) {
      return error;
    }

    if (error instanceof NotFound || error instanceof NoSuchKey) {
      return new FileNotFoundError(key);
    }

    if (error instanceof Error && error.name === 'Forbidden') {
      return new AccessDeniedError(key);
    }

    const cause = toError(error);
    return new StorageError(`Failed to ${action}: ${cause.message}`, 503, cause);
  }
}
