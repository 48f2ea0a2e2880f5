import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { promises as fs } from 'fs';
import { tmpdir } from 'os';
import * as path from 'path';
import { v4 as uuidv4 } from 'uuid';

/**
 * Temp File Service
 * Materialises blob bytes on disk for decoders that need a path
 */
@Injectable()
export class TempFileService {
  private readonly logger = new Logger(TempFileService.name);
  private readonly tempDir: string;

  constructor(private readonly configService: ConfigService) {
    this.tempDir = this.configService.get<string>(
      'LOAD_TEMP_DIR',
      path.join(tmpdir(), 'memoire-ingestion'),
    );
  }

  /**
   * Write `bytes` to `<tempDir>/<uuid>/file<extension>`, run `fn` with the
   * path, and remove the directory whatever `fn` does
   */
  async withTempFile<T>(
    bytes: Buffer,
    extension: string,
    fn: (filePath: string) => Promise<T>,
  ): Promise<T> {
    const dir = path.join(this.tempDir, uuidv4());
    const filePath = path.join(dir, `file${extension}`);

    await fs.mkdir(dir, { recursive: true });
    try {
      await fs.writeFile(filePath, bytes);
      return await fn(filePath);
    } finally {
      await this.cleanup(dir);
    }
  }

  private async cleanup(dir: string): Promise<void> {
    try {
      await fs.rm(dir, { recursive: true, force: true });
      this.logger.debug(`Cleaned up temp directory: ${dir}`);
    } catch (error) {
      // Never mask the result or error of the scoped call
      this.logger.warn(
        `Failed to clean up temp directory ${dir}: ${error instanceof Error ? error.message : String(error)}`,
      );
    }
  }
}
