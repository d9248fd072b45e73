import { CAPTION_RESOLVER } from '../config/constants';
import { isDigit } from '../utils/digits';

/**
 * DigitRunDetector
 *
 * Decides whether a caption fragment is worth resolving. Captions with a
 * short digit run are either correct already or too short to disambiguate.
 */
export class DigitRunDetector {
  /**
   * Whether the text contains at least `minRun` consecutive digits
   *
   * @example
   * ```typescript
   * DigitRunDetector.hasDigitRun('图22015-2016'); // true
   * DigitRunDetector.hasDigitRun('图1-12'); // false
   * ```
   */
  static hasDigitRun(
    text: string,
    minRun: number = CAPTION_RESOLVER.MIN_DIGIT_RUN,
  ): boolean {
    let run = 0;
    for (const char of text) {
      if (!isDigit(char)) {
        run = 0;
        continue;
      }
      run++;
      if (run >= minRun) {
        return true;
      }
    }
    return false;
  }
}
