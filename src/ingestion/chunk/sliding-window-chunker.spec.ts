import { ConfigurationError } from '../../common/errors';
import { SlidingWindowChunker } from './sliding-window-chunker';

describe('SlidingWindowChunker', () => {
  describe('construction', () => {
    it.each([
      [0, 0],
      [100, 100],
      [100, 150],
      [100, -1],
      [-5, 0],
    ])('rejects chunkSize=%d chunkOverlap=%d', (chunkSize, chunkOverlap) => {
      expect(
        () => new SlidingWindowChunker({ chunkSize, chunkOverlap }),
      ).toThrow(ConfigurationError);
    });

    it('accepts zero overlap', () => {
      expect(
        new SlidingWindowChunker({ chunkSize: 10, chunkOverlap: 0 }).chunkSize,
      ).toBe(10);
    });
  });

  describe('chunk', () => {
    const chunker = new SlidingWindowChunker({
      chunkSize: 500,
      chunkOverlap: 100,
    });

    it('returns no chunks for empty or blank text', () => {
      expect(chunker.chunk('', {})).toEqual([]);
      expect(chunker.chunk('    \n  ', {})).toEqual([]);
    });

    it('keeps a short text as a single trimmed chunk', () => {
      expect(chunker.chunk('  hello world  ', { document_id: 'doc-1' })).toEqual(
        [
          {
            content: 'hello world',
            chunkIndex: 0,
            charStart: 0,
            charEnd: 15,
            metadata: { document_id: 'doc-1', total_chunks: 1 },
          },
        ],
      );
    });

    it('slides 500/100 windows over a 1200 character text', () => {
      const chunks = chunker.chunk('x'.repeat(1200), { document_id: 'doc-1' });

      expect(chunks.map((c) => [c.charStart, c.charEnd])).toEqual([
        [0, 500],
        [400, 900],
        [800, 1200],
      ]);
      expect(chunks.map((c) => c.chunkIndex)).toEqual([0, 1, 2]);
      expect(chunks.every((c) => c.metadata.total_chunks === 3)).toBe(true);
    });

    it('covers every character and never exceeds the chunk size', () => {
      const text = Array.from({ length: 2345 }, (_, i) =>
        String.fromCharCode(97 + (i % 26)),
      ).join('');
      const chunks = chunker.chunk(text, {});
      const covered = new Array<boolean>(text.length).fill(false);

      for (const chunk of chunks) {
        expect(chunk.charEnd - chunk.charStart).toBeLessThanOrEqual(500);
        for (let i = chunk.charStart; i < chunk.charEnd; i++) {
          covered[i] = true;
        }
      }

      expect(covered.every(Boolean)).toBe(true);
      expect(chunks[chunks.length - 1].charEnd).toBe(text.length);
    });

    it('skips blank windows and keeps indices sequential', () => {
      const small = new SlidingWindowChunker({ chunkSize: 10, chunkOverlap: 0 });
      const text = `${'a'.repeat(10)}${' '.repeat(20)}${'b'.repeat(10)}`;

      const chunks = small.chunk(text, {});

      expect(
        chunks.map((c) => [c.chunkIndex, c.charStart, c.charEnd, c.content]),
      ).toEqual([
        [0, 0, 10, 'aaaaaaaaaa'],
        [1, 30, 40, 'bbbbbbbbbb'],
      ]);
      expect(chunks.map((c) => c.metadata.total_chunks)).toEqual([2, 2]);
    });

    it('gives each chunk its own metadata object', () => {
      const base = { document_id: 'doc-1', filename: 'memoire.pdf' };
      const chunks = chunker.chunk('y'.repeat(1200), base);

      expect(chunks[0].metadata).not.toBe(chunks[1].metadata);
      expect(chunks[0].metadata).toEqual({ ...base, total_chunks: 3 });
      expect(base).toEqual({ document_id: 'doc-1', filename: 'memoire.pdf' });
    });
  });
});
