import type {
  DocxParagraph,
  ParsedSection,
  PdfPageText,
} from './types';

export const INTRODUCTION_TITLE = 'Introduction';
export const FALLBACK_TITLE = 'Document';

/**
 * One section per page with text. Blank pages are skipped but their page
 * number is still consumed, so `order` may have gaps.
 */
export function buildPdfSections(
  pages: PdfPageText[],
  normalize: (text: string) => string,
): ParsedSection[] {
  return pages
    .filter((page) => page.text.trim().length > 0)
    .map((page) => ({
      title: `Page ${page.pageNumber}`,
      content: normalize(page.text),
      page: page.pageNumber,
      order: page.pageNumber,
    }));
}

export function isHeadingStyle(styleName: string | null): boolean {
  return styleName !== null && /^heading/i.test(styleName);
}

/**
 * Group paragraphs under the closest preceding heading. Text before the
 * first heading goes to an "Introduction" section.
 */
export function buildDocxSections(
  paragraphs: DocxParagraph[],
): ParsedSection[] {
  const sections: ParsedSection[] = [];
  let title = INTRODUCTION_TITLE;
  let lines: string[] = [];
  let order = 0;

  const flush = (): void => {
    const content = lines.join('\n');
    if (content.trim().length > 0) {
      sections.push({ title, content, page: null, order });
      order++;
    }
  };

  for (const paragraph of paragraphs) {
    const text = paragraph.text.trim();

    if (isHeadingStyle(paragraph.styleName)) {
      flush();
      title = text;
      lines = [];
      continue;
    }

    if (text.length > 0) {
      lines.push(text);
    }
  }
  flush();

  if (sections.length === 0) {
    const content = paragraphs
      .map((paragraph) => paragraph.text.trim())
      .filter((text) => text.length > 0)
      .join('\n');
    sections.push({ title: FALLBACK_TITLE, content, page: null, order: 0 });
  }

  return sections;
}

export function joinSections(sections: ParsedSection[]): string {
  return sections.map((section) => section.content).join('\n\n');
}
