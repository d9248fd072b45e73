import { describe, expect, test } from 'vitest';

import { ParagraphSegmenter } from './paragraph-segmenter';

describe('ParagraphSegmenter', () => {
  describe('split', () => {
    test('splits on blank lines and tracks line ranges', () => {
      const text = '标题\n\n第一行\n第二行\n\n如图2所示';

      expect(ParagraphSegmenter.split(text)).toEqual([
        { content: '标题', startLine: 1, endLine: 1, lines: ['标题'] },
        {
          content: '第一行\n第二行',
          startLine: 3,
          endLine: 4,
          lines: ['第一行', '第二行'],
        },
        { content: '如图2所示', startLine: 6, endLine: 6, lines: ['如图2所示'] },
      ]);
    });

    test('trims paragraphs but keeps inner indentation', () => {
      const [paragraph] = ParagraphSegmenter.split('  first\n  second  ');

      expect(paragraph).toEqual({
        content: 'first\n  second',
        startLine: 1,
        endLine: 2,
        lines: ['first', '  second'],
      });
    });

    test('counts a whitespace-only chunk as one line', () => {
      const paragraphs = ParagraphSegmenter.split('a\n\n   \n\nb');

      expect(paragraphs.map((p) => [p.content, p.startLine])).toEqual([
        ['a', 1],
        ['b', 4],
      ]);
    });

    test('lines rebuild the content', () => {
      for (const paragraph of ParagraphSegmenter.split('x\ny\n\nz')) {
        expect(paragraph.lines.join('\n')).toBe(paragraph.content);
      }
    });

    test('returns no paragraphs for empty text', () => {
      expect(ParagraphSegmenter.split('')).toEqual([]);
      expect(ParagraphSegmenter.split('\n\n\n\n')).toEqual([]);
    });
  });

  describe('findByLine', () => {
    const paragraphs = ParagraphSegmenter.split('a\n\nb\nc\n\nd');

    test('finds the paragraph spanning the line', () => {
      expect(ParagraphSegmenter.findByLine(paragraphs, 4)?.content).toBe('b\nc');
      expect(ParagraphSegmenter.findByLine(paragraphs, 6)?.content).toBe('d');
    });

    test('returns null for separator lines', () => {
      expect(ParagraphSegmenter.findByLine(paragraphs, 2)).toBeNull();
    });
  });
});
