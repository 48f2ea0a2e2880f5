/**
 * Narrowing helpers over the mammoth document model handed to
 * `transformDocument` (document → paragraph/table → run → text/tab/break)
 */

import { isRecord } from '../../../common/utils';
import type { DocxParagraph } from '../types';

function childrenOf(element: Record<string, unknown>): unknown[] {
  const children: unknown = element.children;
  return Array.isArray(children) ? children : [];
}

function textOf(element: Record<string, unknown>): string {
  switch (element.type) {
    case 'text':
      return typeof element.value === 'string' ? element.value : '';
    case 'tab':
      return '\t';
    case 'break':
      return '\n';
    default:
      return childrenOf(element).filter(isRecord).map(textOf).join('');
  }
}

/**
 * Top-level paragraphs only; tables and their cells are not sections
 */
export function collectParagraphs(document: unknown): DocxParagraph[] {
  if (!isRecord(document)) {
    return [];
  }

  return childrenOf(document)
    .filter(isRecord)
    .filter((element) => element.type === 'paragraph')
    .map((paragraph) => ({
      text: textOf(paragraph),
      styleName:
        typeof paragraph.styleName === 'string' ? paragraph.styleName : null,
    }));
}

const CORE_PROPERTIES: Record<string, string> = {
  author: 'dc:creator',
  created: 'dcterms:created',
  modified: 'dcterms:modified',
  title: 'dc:title',
  subject: 'dc:subject',
};

function decodeXmlEntities(value: string): string {
  return value
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>')
    .replace(/&quot;/g, '"')
    .replace(/&apos;/g, "'")
    .replace(/&amp;/g, '&');
}

/**
 * Read the Dublin Core fields of docProps/core.xml
 */
export function parseCoreProperties(
  xml: string | null,
): Record<string, string | null> {
  const metadata: Record<string, string | null> = {};

  for (const [key, tag] of Object.entries(CORE_PROPERTIES)) {
    const match = xml?.match(new RegExp(`<${tag}(?:\\s[^>]*)?>([^<]*)</${tag}>`));
    const value = match?.[1] ? decodeXmlEntities(match[1]).trim() : '';
    metadata[key] = value.length > 0 ? value : null;
  }

  return metadata;
}
