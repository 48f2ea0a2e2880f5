/**
 * Repeated line detection (running headers / footers)
 *
 * Kept behind an interface so other strategies (position on page, per-page
 * frequency) can replace the count-based one without touching extraction.
 */

export const REPEATED_LINE_DETECTOR = 'REPEATED_LINE_DETECTOR';

export interface RepeatedLineDetector {
  /**
   * Find trimmed lines that look like running headers or footers
   */
  detectRepeats(text: string, minLength?: number, maxLength?: number): Set<string>;

  /**
   * Remove every whole-line occurrence of the detected patterns
   */
  removeRepeats(text: string): string;
}

export interface FrequencyDetectorOptions {
  minOccurrences?: number;
  minLength?: number;
  maxLength?: number;
}

/**
 * Flags a line as a header/footer when the exact same trimmed line appears
 * at least `minOccurrences` times. Body paragraphs of a technical memoir
 * rarely repeat verbatim that often.
 */
export class FrequencyRepeatedLineDetector implements RepeatedLineDetector {
  private readonly minOccurrences: number;
  private readonly minLength: number;
  private readonly maxLength: number;

  constructor(options: FrequencyDetectorOptions = {}) {
    this.minOccurrences = options.minOccurrences ?? 3;
    this.minLength = options.minLength ?? 10;
    this.maxLength = options.maxLength ?? 100;
  }

  detectRepeats(
    text: string,
    minLength: number = this.minLength,
    maxLength: number = this.maxLength,
  ): Set<string> {
    const counts = new Map<string, number>();

    for (const rawLine of text.split('\n')) {
      const line = rawLine.trim();
      if (line.length < minLength || line.length > maxLength) {
        continue;
      }
      counts.set(line, (counts.get(line) ?? 0) + 1);
    }

    const repeats = new Set<string>();
    for (const [line, count] of counts) {
      if (count >= this.minOccurrences) {
        repeats.add(line);
      }
    }

    return repeats;
  }

  removeRepeats(text: string): string {
    const patterns = this.detectRepeats(text);
    if (patterns.size === 0) {
      return text;
    }

    // Single pass: lines are matched against the patterns found up front
    return text
      .split('\n')
      .filter((line) => !patterns.has(line.trim()))
      .join('\n');
  }
}
