import type { CandidatePair } from '../types';

import { describe, expect, test } from 'vitest';

import { BestCandidateSelector } from './best-candidate-selector';

describe('BestCandidateSelector', () => {
  const pair = (candidate: string): CandidatePair => ({
    candidate,
    references: [],
  });

  test('returns null for no pairs', () => {
    expect(BestCandidateSelector.select([], '000001.jpg')).toBeNull();
  });

  test('picks the candidate closest to the image index', () => {
    const pairs = [pair('图22'), pair('图2')];

    expect(BestCandidateSelector.select(pairs, '000001.jpg')).toBe(pairs[1]);
  });

  test('closer longer candidate beats shorter one', () => {
    const pairs = [pair('图22'), pair('图2')];

    expect(BestCandidateSelector.select(pairs, '000020.jpg')).toBe(pairs[0]);
  });

  test('keeps the first pair on equal distance', () => {
    // index 11: |12 - 11| = 1 and |10 - 11| = 1
    const pairs = [pair('图12'), pair('图10')];

    expect(BestCandidateSelector.select(pairs, '000011.jpg')).toBe(pairs[0]);
  });

  test('treats identifiers without digits as index 0', () => {
    const pairs = [pair('图5'), pair('图3')];

    expect(BestCandidateSelector.select(pairs, 'cover.png')).toBe(pairs[1]);
  });

  test('distance is symmetric', () => {
    expect(BestCandidateSelector.distance(3n, 10n)).toBe(7n);
    expect(BestCandidateSelector.distance(10n, 3n)).toBe(7n);
    expect(BestCandidateSelector.distance(4n, 4n)).toBe(0n);
  });
});
