import { ConfigService } from '@nestjs/config';
import { existsSync } from 'fs';
import { mkdtemp, readFile, readdir, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { dirname, join } from 'path';
import { TempFileService } from './temp-file.service';

describe('TempFileService', () => {
  let baseDir: string;
  let service: TempFileService;

  beforeEach(async () => {
    baseDir = await mkdtemp(join(tmpdir(), 'temp-file-service-'));
    service = new TempFileService(new ConfigService({ LOAD_TEMP_DIR: baseDir }));
  });

  afterEach(async () => {
    await rm(baseDir, { recursive: true, force: true });
  });

  it('exposes the bytes at a path with the requested extension', async () => {
    const content = await service.withTempFile(
      Buffer.from('mémoire'),
      '.pdf',
      async (filePath) => {
        expect(filePath.startsWith(baseDir)).toBe(true);
        expect(filePath.endsWith('file.pdf')).toBe(true);
        return readFile(filePath, 'utf-8');
      },
    );

    expect(content).toBe('mémoire');
    expect(await readdir(baseDir)).toEqual([]);
  });

  it('removes the file when the callback throws', async () => {
    let seenPath = '';

    await expect(
      service.withTempFile(Buffer.from('x'), '.docx', async (filePath) => {
        seenPath = filePath;
        throw new Error('decoder exploded');
      }),
    ).rejects.toThrow('decoder exploded');

    expect(seenPath).not.toBe('');
    expect(existsSync(dirname(seenPath))).toBe(false);
    expect(await readdir(baseDir)).toEqual([]);
  });
});
