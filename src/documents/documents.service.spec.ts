import { NotFoundError, ValidationError } from '../common/errors';
import { StorageService } from '../storage/storage.service';
import { InMemorySourceDocumentRepository } from '../testing/in-memory-source-document.repository';
import { InMemoryStorageProvider } from '../testing/in-memory-storage.provider';
import {
  createVectorIndexFixture,
  type VectorIndexFixture,
} from '../testing/vector-index.fixture';
import { DocumentsService } from './documents.service';

describe('DocumentsService', () => {
  let repository: InMemorySourceDocumentRepository;
  let storage: InMemoryStorageProvider;
  let fixture: VectorIndexFixture;
  let service: DocumentsService;

  beforeEach(() => {
    repository = new InMemorySourceDocumentRepository();
    storage = new InMemoryStorageProvider();
    fixture = createVectorIndexFixture({ MAX_FILE_SIZE_MB: 1 });
    service = new DocumentsService(
      repository,
      new StorageService(storage),
      fixture.vectorIndex,
      fixture.config,
    );
  });

  describe('upload', () => {
    it('stores the bytes and registers the document', async () => {
      const document = await service.upload(
        'Mémoire Lyon 2022.pdf',
        Buffer.from('%PDF-1.7'),
        { client: 'Métropole de Lyon' },
      );

      expect(document).toMatchObject({
        filename: 'Mémoire Lyon 2022.pdf',
        client: 'Métropole de Lyon',
        year: 2022,
        parsed: false,
        indexed: false,
      });
      expect(document.storagePath).toMatch(
        /^memoires\/Memoire_Lyon_2022_\d{8}_\d{6}\.pdf$/,
      );
      expect(storage.objects.get(document.storagePath)?.body.toString()).toBe(
        '%PDF-1.7',
      );
      expect(storage.objects.get(document.storagePath)?.contentType).toBe(
        'application/pdf',
      );
    });

    it('prefers an explicit year', async () => {
      const document = await service.upload(
        'offre-2019.docx',
        Buffer.from('docx'),
        { year: 2021 },
      );

      expect(document.year).toBe(2021);
      expect(document.client).toBeNull();
    });

    it.each<[string, Buffer, string]>([
      ['notes.txt', Buffer.from('x'), "Unsupported file type '.txt'. Only .pdf, .docx, .doc are allowed."],
      ['vide.pdf', Buffer.alloc(0), 'File is empty'],
      ['gros.pdf', Buffer.alloc(2 * 1024 * 1024), 'File size (2MB) exceeds maximum allowed size of 1MB'],
    ])('rejects %s', async (filename, bytes, message) => {
      const error = await service.upload(filename, bytes).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ValidationError);
      expect(error).toMatchObject({ message });
      expect(storage.objects.size).toBe(0);
      expect(repository.rows.size).toBe(0);
    });

    it('removes the stored object when the record cannot be inserted', async () => {
      jest
        .spyOn(repository, 'create')
        .mockRejectedValueOnce(new Error('connection lost'));

      await expect(
        service.upload('memoire-2022.pdf', Buffer.from('pdf')),
      ).rejects.toThrow('connection lost');

      expect(storage.objects.size).toBe(0);
      expect(repository.rows.size).toBe(0);
    });
  });

  it('fails with NotFoundError for an unknown id', async () => {
    await expect(service.findOne('missing')).rejects.toBeInstanceOf(
      NotFoundError,
    );
  });

  it('lists documents newest first', async () => {
    const first = await service.upload('a.pdf', Buffer.from('a'));
    const second = await service.upload('b.pdf', Buffer.from('b'));

    expect((await service.findAll()).map((d) => d.id)).toEqual([
      second.id,
      first.id,
    ]);
  });

  it('removes the blob, the record, the chunks and the vectors', async () => {
    const document = await service.upload('a.pdf', Buffer.from('a'));
    await fixture.vectorIndex.upsertChunks(document.id, [
      {
        content: 'béton',
        chunkIndex: 0,
        charStart: 0,
        charEnd: 5,
        metadata: { document_id: document.id },
      },
    ]);
    await fixture.vectorIndex.index(document.id);

    await expect(service.remove(document.id)).resolves.toEqual({
      id: document.id,
      deleted: true,
    });

    expect(repository.rows.has(document.id)).toBe(false);
    expect(storage.objects.size).toBe(0);
    expect(fixture.vectorStore.points.size).toBe(0);
    expect(fixture.chunkRepository.rows.size).toBe(0);
  });
});
