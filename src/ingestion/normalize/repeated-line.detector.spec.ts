import { FrequencyRepeatedLineDetector } from './repeated-line.detector';

const FOOTER = 'Confidential — Draft v2';

function pagesWithFooter(count: number): string {
  return Array.from(
    { length: count },
    (_, i) => `Unique content for page number ${i + 1}\n${FOOTER}`,
  ).join('\n\n');
}

describe('FrequencyRepeatedLineDetector', () => {
  const detector = new FrequencyRepeatedLineDetector();

  describe('detectRepeats', () => {
    it('flags a footer present on ten pages', () => {
      expect([...detector.detectRepeats(pagesWithFooter(10))]).toEqual([
        FOOTER,
      ]);
    });

    it('ignores lines seen fewer than three times', () => {
      expect(detector.detectRepeats(pagesWithFooter(2)).size).toBe(0);
    });

    it('ignores lines outside the length bounds', () => {
      const short = Array(5).fill('Short').join('\n');
      const long = Array(5).fill('L'.repeat(101)).join('\n');

      expect(detector.detectRepeats(`${short}\n${long}`).size).toBe(0);
    });

    it('honours explicit length bounds', () => {
      const text = Array(3).fill('Short').join('\n');
      expect([...detector.detectRepeats(text, 3, 10)]).toEqual(['Short']);
    });

    it('uses the configured occurrence threshold', () => {
      const strict = new FrequencyRepeatedLineDetector({ minOccurrences: 5 });
      expect(strict.detectRepeats(pagesWithFooter(4)).size).toBe(0);
      expect(strict.detectRepeats(pagesWithFooter(5)).size).toBe(1);
    });
  });

  describe('removeRepeats', () => {
    it('removes whole-line occurrences only', () => {
      const text = `${pagesWithFooter(3)}\n${FOOTER} appendix`;
      const result = detector.removeRepeats(text);

      expect(result.split('\n')).not.toContain(FOOTER);
      expect(result.endsWith(`${FOOTER} appendix`)).toBe(true);
    });

    it('removes repeats at the start and end of the text', () => {
      const text = [FOOTER, 'Alpha section text', FOOTER, 'Beta', FOOTER].join(
        '\n',
      );
      expect(detector.removeRepeats(text)).toBe('Alpha section text\nBeta');
    });

    it('returns the input unchanged when nothing repeats', () => {
      const text = 'One line of text\nAnother line of text';
      expect(detector.removeRepeats(text)).toBe(text);
    });
  });
});
