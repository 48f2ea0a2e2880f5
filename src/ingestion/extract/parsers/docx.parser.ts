/**
 * Word Parser
 *
 * Walks mammoth's document model to keep paragraph styles, so headings can
 * delimit sections. Core properties are read from the package with JSZip.
 */

import { Injectable, Logger } from '@nestjs/common';
import { readFile } from 'fs/promises';
import JSZip from 'jszip';
import * as mammoth from 'mammoth';
import { ParseError, toError } from '../../../common/errors';
import { TextNormalizerService } from '../../normalize/text-normalizer.service';
import { buildDocxSections, joinSections } from '../section-builder';
import type { DocumentParser, DocxParagraph, ExtractionResult } from '../types';
import { collectParagraphs, parseCoreProperties } from './docx-elements';

@Injectable()
export class DocxParser implements DocumentParser {
  readonly format = 'docx';
  readonly extensions = ['.docx', '.doc'] as const;

  private readonly logger = new Logger(DocxParser.name);

  constructor(private readonly normalizer: TextNormalizerService) {}

  async parse(filePath: string): Promise<ExtractionResult> {
    const startTime = Date.now();
    this.logger.log(`Parsing Word file: ${filePath}`);

    let paragraphs: DocxParagraph[];
    try {
      paragraphs = await this.readParagraphs(filePath);
    } catch (error) {
      this.logger.error(
        `Word parsing failed - Duration: ${Date.now() - startTime}ms, File: ${filePath}`,
        error instanceof Error ? error.stack : String(error),
      );
      throw new ParseError(
        filePath,
        'corrupted',
        'Failed to parse Word file. File may be corrupted or in unsupported format.',
        toError(error),
      );
    }

    const sections = buildDocxSections(paragraphs);
    const fullText = this.normalizer.clean(joinSections(sections));
    const metadata = await this.readCoreProperties(filePath);

    this.logger.log(
      `Word parsing complete - Duration: ${Date.now() - startTime}ms, ` +
        `Paragraphs: ${paragraphs.length}, Sections: ${sections.length}`,
    );

    return {
      sections,
      fullText,
      charCount: fullText.length,
      paragraphCount: paragraphs.length,
      metadata,
    };
  }

  private async readParagraphs(filePath: string): Promise<DocxParagraph[]> {
    let paragraphs: DocxParagraph[] = [];

    await mammoth.convertToHtml(
      { path: filePath },
      {
        transformDocument: (document: unknown) => {
          paragraphs = collectParagraphs(document);
          return document;
        },
      },
    );

    return paragraphs;
  }

  private async readCoreProperties(
    filePath: string,
  ): Promise<Record<string, string | null>> {
    try {
      const zip = await JSZip.loadAsync(await readFile(filePath));
      const coreXml = await zip.file('docProps/core.xml')?.async('string');
      return parseCoreProperties(coreXml ?? null);
    } catch (error) {
      this.logger.warn(
        `Failed to read core properties from ${filePath}`,
        error instanceof Error ? error.message : String(error),
      );
      return parseCoreProperties(null);
    }
  }
}
