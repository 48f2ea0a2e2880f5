import { ConfigurationError } from '../../common/errors';
import type { ChunkDraft, ChunkerOptions } from './chunk.types';

/**
 * Fixed-size character windows with overlap. Windows are cut on raw
 * character offsets; the stored content is the trimmed slice.
 */
export class SlidingWindowChunker {
  readonly chunkSize: number;
  readonly chunkOverlap: number;

  constructor(options: ChunkerOptions) {
    const { chunkSize, chunkOverlap } = options;

    if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
      throw new ConfigurationError(
        `chunkSize must be a positive integer, got ${chunkSize}`,
      );
    }
    if (!Number.isInteger(chunkOverlap) || chunkOverlap < 0) {
      throw new ConfigurationError(
        `chunkOverlap must be a non-negative integer, got ${chunkOverlap}`,
      );
    }
    if (chunkOverlap >= chunkSize) {
      throw new ConfigurationError(
        `chunkOverlap (${chunkOverlap}) must be smaller than chunkSize (${chunkSize})`,
      );
    }

    this.chunkSize = chunkSize;
    this.chunkOverlap = chunkOverlap;
  }

  chunk(text: string, baseMetadata: Record<string, unknown> = {}): ChunkDraft[] {
    if (!text) {
      return [];
    }

    const length = text.length;
    const windows: Array<Omit<ChunkDraft, 'metadata'>> = [];

    if (length <= this.chunkSize) {
      const content = text.trim();
      if (content.length > 0) {
        windows.push({ content, chunkIndex: 0, charStart: 0, charEnd: length });
      }
    } else {
      const step = this.chunkSize - this.chunkOverlap;

      for (let start = 0; start < length; start += step) {
        const end = Math.min(start + this.chunkSize, length);
        const content = text.slice(start, end).trim();

        if (content.length > 0) {
          windows.push({
            content,
            chunkIndex: windows.length,
            charStart: start,
            charEnd: end,
          });
        }
      }
    }

    const totalChunks = windows.length;
    return windows.map((window) => ({
      ...window,
      metadata: { ...baseMetadata, total_chunks: totalChunks },
    }));
  }
}
