import type { CandidatePair } from '../types';

import { extractNumber } from '../utils/digits';

/**
 * BestCandidateSelector
 *
 * Picks the candidate whose digits are numerically closest to the image's
 * own sequence index. Ties go to the pair seen first, which for the
 * resolver's output is the longer candidate.
 */
export class BestCandidateSelector {
  /**
   * @param pairs - Successful candidates in generation order
   * @param imageIdentifier - Image file name (e.g., "000001.jpg")
   * @returns The closest pair, or null when there are no pairs
   */
  static select(
    pairs: readonly CandidatePair[],
    imageIdentifier: string,
  ): CandidatePair | null {
    const indexNumber = extractNumber(imageIdentifier);

    let best: CandidatePair | null = null;
    let bestDistance: bigint | null = null;

    for (const pair of pairs) {
      const distance = this.distance(extractNumber(pair.candidate), indexNumber);
      if (bestDistance === null || distance < bestDistance) {
        best = pair;
        bestDistance = distance;
      }
    }

    return best;
  }

  /**
   * Absolute difference between two numbers
   */
  static distance(a: bigint, b: bigint): bigint {
    return a > b ? a - b : b - a;
  }
}
