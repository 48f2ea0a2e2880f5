import { InMemoryStorageProvider } from '../testing/in-memory-storage.provider';
import { FileNotFoundError } from './errors';
import { StorageService } from './storage.service';

describe('StorageService', () => {
  let provider: InMemoryStorageProvider;
  let storage: StorageService;

  beforeEach(() => {
    provider = new InMemoryStorageProvider();
    storage = new StorageService(provider);
  });

  it.each<[string, string]>([
    ['memoires/a.pdf', 'application/pdf'],
    [
      'memoires/b.DOCX',
      'application/vnd.openxmlformats-officedocument.wordprocessingml.document',
    ],
    ['memoires/c.doc', 'application/msword'],
    ['memoires/d.bin', 'application/octet-stream'],
  ])('stores %s as %s', async (path, contentType) => {
    await storage.put(path, Buffer.from('x'));

    expect(provider.objects.get(path)?.contentType).toBe(contentType);
  });

  it('keeps an explicit content type', async () => {
    await storage.put('rc/p1/rc.pdf', Buffer.from('x'), 'application/x-test');

    expect(provider.objects.get('rc/p1/rc.pdf')?.contentType).toBe(
      'application/x-test',
    );
  });

  it('round-trips, lists and deletes objects', async () => {
    await storage.put('memoires/a.pdf', Buffer.from('alpha'));
    await storage.put('rc/p1/rc.pdf', Buffer.from('beta'));

    expect((await storage.get('memoires/a.pdf')).toString()).toBe('alpha');
    expect((await storage.list('memoires/')).map((e) => e.key)).toEqual([
      'memoires/a.pdf',
    ]);
    expect(await storage.exists('rc/p1/rc.pdf')).toBe(true);

    await storage.delete(['memoires/a.pdf']);

    expect(await storage.exists('memoires/a.pdf')).toBe(false);
    await expect(storage.get('memoires/a.pdf')).rejects.toBeInstanceOf(
      FileNotFoundError,
    );
  });
});
