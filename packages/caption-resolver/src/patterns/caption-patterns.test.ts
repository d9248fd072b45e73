import { describe, expect, test } from 'vitest';

import { PatternCompileError } from '../errors/pattern-compile-error';
import {
  CAPTION_PATTERNS,
  CAPTION_REFERENCE_MATCHER,
  FIGURE_IDENTIFIER_MATCHER,
  compileCaptionPatterns,
} from './caption-patterns';

const firstMatch = (pattern: RegExp, text: string): string | null =>
  pattern.exec(text)?.[0] ?? null;

describe('caption patterns', () => {
  describe('CAPTION_REFERENCE_MATCHER', () => {
    test('matches a CJK figure marker', () => {
      expect(firstMatch(CAPTION_REFERENCE_MATCHER, '图2所示经济持续下降')).toBe(
        '图2',
      );
    });

    test('includes an optional letter and trailing whitespace for CJK markers', () => {
      expect(firstMatch(CAPTION_REFERENCE_MATCHER, '图 A 3.1 所示')).toBe(
        '图 A 3.1 ',
      );
    });

    test('matches "Figure N" without trailing words', () => {
      expect(firstMatch(CAPTION_REFERENCE_MATCHER, 'Figure 3 shows')).toBe(
        'Figure 3',
      );
    });

    test('matches multi-level numbers case-insensitively', () => {
      expect(firstMatch(CAPTION_REFERENCE_MATCHER, 'FIGURE 12.3')).toBe(
        'FIGURE 12.3',
      );
      expect(firstMatch(CAPTION_REFERENCE_MATCHER, 'see fig. 4-1 below')).toBe(
        'fig. 4-1 ',
      );
    });

    test('leftmost convention wins', () => {
      expect(firstMatch(CAPTION_REFERENCE_MATCHER, 'Fig. 3 and 图2')).toBe(
        'Fig. 3',
      );
    });

    test('matches full-width digits', () => {
      expect(firstMatch(CAPTION_REFERENCE_MATCHER, '如图２所示')).toBe('图２');
      expect(firstMatch(CAPTION_REFERENCE_MATCHER, 'Figure ３.１ shows')).toBe(
        'Figure ３.１ ',
      );
    });

    test('requires a number after the marker', () => {
      expect(firstMatch(CAPTION_REFERENCE_MATCHER, 'Figure shows')).toBeNull();
      expect(firstMatch(CAPTION_REFERENCE_MATCHER, 'no reference here')).toBeNull();
    });
  });

  describe('FIGURE_IDENTIFIER_MATCHER', () => {
    test('keeps a corrupted CJK identifier whole', () => {
      expect(
        firstMatch(FIGURE_IDENTIFIER_MATCHER, '图22015-2016年经济增长'),
      ).toBe('图22015-2016');
    });

    test('keeps a full-width CJK identifier whole', () => {
      expect(firstMatch(FIGURE_IDENTIFIER_MATCHER, '图２２０１５年经济增长')).toBe(
        '图２２０１５',
      );
    });

    test('matches English captions', () => {
      expect(firstMatch(FIGURE_IDENTIFIER_MATCHER, 'Figure 3.1: Overview')).toBe(
        'Figure 3.1',
      );
      expect(firstMatch(FIGURE_IDENTIFIER_MATCHER, 'Fig.12 Sales')).toBe(
        'Fig.12',
      );
    });
  });

  describe('compileCaptionPatterns', () => {
    test('defines the three caption conventions', () => {
      expect(CAPTION_PATTERNS.map((pattern) => pattern.name)).toEqual([
        'cjk',
        'figure',
        'fig',
      ]);
    });

    test('compiles into a case-insensitive alternation', () => {
      const compiled = compileCaptionPatterns([
        { name: 'a', source: 'ab' },
        { name: 'b', source: 'cd' },
      ]);

      expect(compiled.source).toBe('(?:ab)|(?:cd)');
      expect(compiled.flags).toBe('iu');
    });

    test('throws PatternCompileError naming the broken pattern', () => {
      expect(() =>
        compileCaptionPatterns([{ name: 'broken', source: '图(' }]),
      ).toThrow(PatternCompileError);
      expect(() =>
        compileCaptionPatterns([{ name: 'broken', source: '图(' }]),
      ).toThrow(/^Invalid caption pattern "broken": /);
    });

    test('throws on an empty pattern set', () => {
      expect(() => compileCaptionPatterns([])).toThrow(
        'Caption pattern set is empty',
      );
    });
  });
});
