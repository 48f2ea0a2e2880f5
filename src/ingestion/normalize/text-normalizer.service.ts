/**
 * Text Normalizer Service
 *
 * Cleans text coming out of the PDF / Word extractors before chunking:
 * line endings, control characters, whitespace, page-number artifacts and
 * extraction noise. `normalize` is idempotent.
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  REPEATED_LINE_DETECTOR,
  type RepeatedLineDetector,
} from './repeated-line.detector';

// eslint-disable-next-line no-control-regex
const CONTROL_CHARACTERS = /[\x00-\x08\x0B\x0C\x0E-\x1F\x7F]/g;

const PAGE_NUMBER_PATTERNS: RegExp[] = [
  /^\d+$/,
  /^page\s+\d+(\s*(of|sur|\/)\s*\d+)?$/i,
  /^\d+\s*\/\s*\d+$/,
];

@Injectable()
export class TextNormalizerService {
  private readonly logger = new Logger(TextNormalizerService.name);

  constructor(
    @Inject(REPEATED_LINE_DETECTOR)
    private readonly repeatedLineDetector: RepeatedLineDetector,
  ) {}

  /**
   * Normalize raw extracted text
   *
   * Steps:
   * 1. CRLF / CR → LF, strip control characters (keeps \n and \t)
   * 2. Runs of spaces/tabs → single space, trim every line
   * 3. Drop page-number lines and 1–2 character noise lines
   * 4. 3+ newlines → paragraph break, trim overall
   */
  normalize(raw: string): string {
    if (!raw) {
      return '';
    }

    const collapsed = raw
      .replace(/\r\n?/g, '\n')
      .replace(CONTROL_CHARACTERS, '')
      .replace(/[ \t]+/g, ' ');

    const lines = collapsed
      .split('\n')
      .map((line) => line.trim())
      .filter((line) => this.keepLine(line));

    return lines
      .join('\n')
      .replace(/\n{3,}/g, '\n\n')
      .trim();
  }

  /**
   * Remove running headers / footers detected by the configured detector
   */
  removeRepeats(text: string): string {
    const patterns = this.repeatedLineDetector.detectRepeats(text);

    if (patterns.size > 0) {
      this.logger.log(
        `Removing ${patterns.size} repeated line pattern(s): ${[...patterns]
          .map((pattern) => JSON.stringify(pattern))
          .join(', ')}`,
      );
    }

    return this.repeatedLineDetector.removeRepeats(text);
  }

  /**
   * Full cleaning pass used on a document's concatenated text
   */
  clean(raw: string): string {
    const normalized = this.normalize(raw);
    return this.normalize(this.removeRepeats(normalized));
  }

  private keepLine(line: string): boolean {
    if (line.length === 0) {
      return true; // paragraph separator
    }

    if (line.length <= 2) {
      return false;
    }

    return !PAGE_NUMBER_PATTERNS.some((pattern) => pattern.test(line));
  }
}
