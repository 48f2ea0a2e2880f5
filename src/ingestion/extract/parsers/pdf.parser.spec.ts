import { Document } from '@langchain/core/documents';
import { ParseError } from '../../../common/errors';
import { FrequencyRepeatedLineDetector } from '../../normalize/repeated-line.detector';
import { TextNormalizerService } from '../../normalize/text-normalizer.service';
import { PdfParser } from './pdf.parser';

const mockLoad = jest.fn<Promise<Document[]>, []>();

jest.mock('@langchain/community/document_loaders/fs/pdf', () => ({
  PDFLoader: jest.fn().mockImplementation(() => ({ load: mockLoad })),
}));

function page(pageNumber: number, pageContent: string): Document {
  return new Document({
    pageContent,
    metadata: {
      loc: { pageNumber },
      pdf: {
        totalPages: 3,
        info: { Author: 'Entreprise Durand', Title: 'Mémoire' },
      },
    },
  });
}

describe('PdfParser', () => {
  const parser = new PdfParser(
    new TextNormalizerService(new FrequencyRepeatedLineDetector()),
  );

  beforeEach(() => {
    mockLoad.mockReset();
  });

  it('builds page sections, cleaned text and info metadata', async () => {
    mockLoad.mockResolvedValue([
      page(1, 'Présentation\n12\nde l’entreprise'),
      page(3, 'Moyens   matériels'),
    ]);

    const result = await parser.parse('/tmp/memoire.pdf');

    expect(result.sections).toEqual([
      {
        title: 'Page 1',
        content: 'Présentation\nde l’entreprise',
        page: 1,
        order: 1,
      },
      { title: 'Page 3', content: 'Moyens matériels', page: 3, order: 3 },
    ]);
    expect(result.fullText).toBe(
      'Présentation\nde l’entreprise\n\nMoyens matériels',
    );
    expect(result.charCount).toBe(result.fullText.length);
    expect(result.pageCount).toBe(3);
    expect(result.metadata).toEqual({
      author: 'Entreprise Durand',
      creator: null,
      producer: null,
      subject: null,
      title: 'Mémoire',
    });
  });

  it('classifies password errors', async () => {
    mockLoad.mockRejectedValue(new Error('No password given'));

    await expect(parser.parse('/tmp/locked.pdf')).rejects.toMatchObject({
      name: 'ParseError',
      reason: 'password_protected',
      filePath: '/tmp/locked.pdf',
    });
  });

  it('classifies corrupted files', async () => {
    mockLoad.mockRejectedValue(new Error('Invalid PDF structure'));

    const error = await parser.parse('/tmp/broken.pdf').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ParseError);
    expect(error).toMatchObject({ reason: 'corrupted', statusCode: 422 });
  });
});
