import { Injectable, Logger } from '@nestjs/common';
import { stat } from 'fs/promises';
import { NotFoundError } from '../../common/errors';
import { ParserFactory } from './parsers/parser.factory';
import type { ExtractionResult } from './types';

/**
 * Document Extractor Service
 * Turns a PDF or Word file on disk into ordered sections plus cleaned text
 */
@Injectable()
export class DocumentExtractorService {
  private readonly logger = new Logger(DocumentExtractorService.name);

  constructor(private readonly parserFactory: ParserFactory) {}

  /**
   * @param format - extension override (`pdf`, `.docx`...), defaults to the file's
   */
  async extract(filePath: string, format?: string): Promise<ExtractionResult> {
    if (!(await this.isFile(filePath))) {
      throw new NotFoundError('File', filePath);
    }

    const parser =
      format !== undefined
        ? this.parserFactory.getParser(format)
        : this.parserFactory.getParserForFile(filePath);

    const result = await parser.parse(filePath);

    this.logger.log(
      `Extracted ${result.sections.length} sections, ${result.charCount} chars from ${filePath}`,
    );

    return result;
  }

  private async isFile(filePath: string): Promise<boolean> {
    try {
      return (await stat(filePath)).isFile();
    } catch {
      return false;
    }
  }
}
