import { Injectable } from '@nestjs/common';
import { extname } from 'path';
import { UnsupportedFormatError } from '../../../common/errors';
import type { DocumentParser } from '../types';
import { DocxParser } from './docx.parser';
import { PdfParser } from './pdf.parser';

/**
 * Parser Factory
 * Selects the parser from the file extension (case-insensitive)
 */
@Injectable()
export class ParserFactory {
  private readonly parsers: DocumentParser[];

  constructor(pdfParser: PdfParser, docxParser: DocxParser) {
    this.parsers = [pdfParser, docxParser];
  }

  getParser(extension: string): DocumentParser {
    const normalized = ParserFactory.normalizeExtension(extension);
    const parser = this.parsers.find((candidate) =>
      candidate.extensions.some((ext) => ext === normalized),
    );

    if (!parser) {
      throw new UnsupportedFormatError(normalized);
    }

    return parser;
  }

  getParserForFile(filePath: string): DocumentParser {
    return this.getParser(extname(filePath));
  }

  static normalizeExtension(extension: string): string {
    const lower = extension.trim().toLowerCase();
    if (lower.length === 0) {
      return '';
    }
    return lower.startsWith('.') ? lower : `.${lower}`;
  }
}
