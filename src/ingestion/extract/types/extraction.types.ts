/**
 * Extraction types shared by the PDF and Word parsers
 */

export type DocumentFormat = 'pdf' | 'docx';

/**
 * One titled block of a source document. PDF sections are pages,
 * Word sections are the content between two headings.
 */
export interface ParsedSection {
  readonly title: string | null;
  readonly content: string;
  readonly page: number | null;
  readonly order: number;
}

export interface ExtractionResult {
  sections: ParsedSection[];
  /** Sections joined by a blank line, then cleaned */
  fullText: string;
  charCount: number;
  pageCount?: number;
  paragraphCount?: number;
  metadata: Record<string, string | null>;
}

/**
 * Raw page text as returned by the PDF loader (1-based page numbers)
 */
export interface PdfPageText {
  pageNumber: number;
  text: string;
}

/**
 * Top-level Word paragraph with the name of its paragraph style
 */
export interface DocxParagraph {
  text: string;
  styleName: string | null;
}

export interface DocumentParser {
  readonly format: DocumentFormat;
  readonly extensions: readonly string[];
  parse(filePath: string): Promise<ExtractionResult>;
}
