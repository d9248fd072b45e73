import { CAPTION_RESOLVER } from '../config/constants';
import { containsDigit } from '../utils/digits';

/**
 * CandidateGenerator
 *
 * Right-truncates a caption fragment one code point at a time. Corruption
 * usually appends noise (a year, a second figure number) after the real
 * reference, so the true reference is one of the prefixes.
 */
export class CandidateGenerator {
  /**
   * Lazy sequence of candidates, longest first.
   *
   * The untruncated fragment is not part of the sequence. It ends before a
   * candidate would be shorter than two characters or lose its last digit.
   * Every `for...of` over the result starts again from the full fragment.
   *
   * @example
   * ```typescript
   * [...CandidateGenerator.generate('图2015')];
   * // ['图201', '图20', '图2']
   * ```
   */
  static generate(captionPart: string): Iterable<string> {
    return {
      *[Symbol.iterator]() {
        const chars = Array.from(captionPart);
        while (chars.length > 1) {
          chars.pop();
          if (chars.length < CAPTION_RESOLVER.MIN_CANDIDATE_LENGTH) {
            return;
          }
          const candidate = chars.join('');
          if (!containsDigit(candidate)) {
            return;
          }
          yield candidate;
        }
      },
    };
  }
}
