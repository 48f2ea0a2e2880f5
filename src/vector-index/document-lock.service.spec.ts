import { DocumentLockService } from './document-lock.service';

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('DocumentLockService', () => {
  let lock: DocumentLockService;

  beforeEach(() => {
    lock = new DocumentLockService();
  });

  it('runs calls for the same key one after another', async () => {
    const events: string[] = [];
    const gate = deferred();

    const first = lock.runExclusive('doc-1', async () => {
      events.push('first:start');
      await gate.promise;
      events.push('first:end');
    });
    const second = lock.runExclusive('doc-1', async () => {
      events.push('second:start');
    });

    await Promise.resolve();
    expect(events).toEqual(['first:start']);

    gate.resolve();
    await Promise.all([first, second]);

    expect(events).toEqual(['first:start', 'first:end', 'second:start']);
  });

  it('does not block other keys', async () => {
    const gate = deferred();
    const blocked = lock.runExclusive('doc-1', () => gate.promise);

    await expect(
      lock.runExclusive('doc-2', async () => 'done'),
    ).resolves.toBe('done');

    gate.resolve();
    await blocked;
  });

  it('releases the key after a failure', async () => {
    await expect(
      lock.runExclusive('doc-1', async () => {
        throw new Error('boom');
      }),
    ).rejects.toThrow('boom');

    await expect(lock.runExclusive('doc-1', async () => 42)).resolves.toBe(42);
  });
});
