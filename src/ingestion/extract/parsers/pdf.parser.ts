/**
 * PDF Parser
 *
 * Uses LangChain.js PDFLoader (pdf-parse) to read one document per page
 */

import { Injectable, Logger } from '@nestjs/common';
import { PDFLoader } from '@langchain/community/document_loaders/fs/pdf';
import { Document } from '@langchain/core/documents';
import { ParseError, toError } from '../../../common/errors';
import { isRecord, readNumber, readString } from '../../../common/utils';
import { TextNormalizerService } from '../../normalize/text-normalizer.service';
import { buildPdfSections, joinSections } from '../section-builder';
import type { DocumentParser, ExtractionResult, PdfPageText } from '../types';

const INFO_FIELDS = {
  author: 'Author',
  creator: 'Creator',
  producer: 'Producer',
  subject: 'Subject',
  title: 'Title',
} as const;

@Injectable()
export class PdfParser implements DocumentParser {
  readonly format = 'pdf';
  readonly extensions = ['.pdf'] as const;

  private readonly logger = new Logger(PdfParser.name);

  constructor(private readonly normalizer: TextNormalizerService) {}

  async parse(filePath: string): Promise<ExtractionResult> {
    const startTime = Date.now();
    this.logger.log(`Parsing PDF file: ${filePath}`);

    let documents: Document[];
    try {
      const loader = new PDFLoader(filePath, {
        splitPages: true,
        parsedItemSeparator: ' ',
      });
      documents = await loader.load();
    } catch (error) {
      this.logger.error(
        `PDF parsing failed - Duration: ${Date.now() - startTime}ms, File: ${filePath}`,
        error instanceof Error ? error.stack : String(error),
      );
      throw this.classifyError(filePath, error);
    }

    // The loader skips pages without text items; page numbers come from loc
    const pages: PdfPageText[] = documents.map((doc, index) => ({
      pageNumber: this.pageNumberOf(doc) ?? index + 1,
      text: doc.pageContent,
    }));

    const sections = buildPdfSections(pages, (text) =>
      this.normalizer.normalize(text),
    );
    const fullText = this.normalizer.clean(joinSections(sections));
    const pdfMetadata = this.pdfMetadataOf(documents[0]);

    this.logger.log(
      `PDF parsing complete - Duration: ${Date.now() - startTime}ms, ` +
        `Pages: ${pdfMetadata.totalPages ?? documents.length}, ` +
        `Sections: ${sections.length}`,
    );

    return {
      sections,
      fullText,
      charCount: fullText.length,
      pageCount: pdfMetadata.totalPages ?? documents.length,
      metadata: pdfMetadata.info,
    };
  }

  private pageNumberOf(doc: Document): number | null {
    const loc: unknown = doc.metadata.loc;
    return isRecord(loc) ? readNumber(loc, 'pageNumber') : null;
  }

  private pdfMetadataOf(doc: Document | undefined): {
    totalPages: number | null;
    info: Record<string, string | null>;
  } {
    const pdf: unknown = doc?.metadata.pdf;
    const pdfRecord = isRecord(pdf) ? pdf : undefined;
    const info: unknown = pdfRecord?.info;
    const infoRecord = isRecord(info) ? info : undefined;

    const metadata: Record<string, string | null> = {};
    for (const [key, field] of Object.entries(INFO_FIELDS)) {
      metadata[key] = readString(infoRecord, field);
    }

    return {
      totalPages: readNumber(pdfRecord, 'totalPages'),
      info: metadata,
    };
  }

  private classifyError(filePath: string, error: unknown): ParseError {
    const cause = toError(error);
    const message = cause.message.toLowerCase();

    if (message.includes('password') || message.includes('encrypted')) {
      return new ParseError(
        filePath,
        'password_protected',
        'PDF file is password-protected. Please provide an unencrypted version.',
        cause,
      );
    }

    if (
      message.includes('invalid pdf') ||
      message.includes('corrupt') ||
      message.includes('damaged')
    ) {
      return new ParseError(
        filePath,
        'corrupted',
        'PDF file is corrupted or invalid',
        cause,
      );
    }

    return new ParseError(
      filePath,
      'unreadable',
      `Failed to parse PDF file: ${cause.message}`,
      cause,
    );
  }
}
