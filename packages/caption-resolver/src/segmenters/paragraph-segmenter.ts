import type { ParagraphRecord } from '@figref/model';

/**
 * ParagraphSegmenter
 *
 * Splits document text into paragraphs on blank lines and records the
 * 1-based source lines each paragraph spans.
 *
 * Whitespace-only chunks count as a single line, so runs of three or more
 * newlines shift the line numbers of later paragraphs. Callers feeding
 * these records to CaptionResolver must compute image line numbers from
 * the same text for the self-exclusion check to line up.
 */
export class ParagraphSegmenter {
  /**
   * @example
   * ```typescript
   * ParagraphSegmenter.split('标题\n\n第一行\n第二行');
   * // [
   * //   { content: '标题', startLine: 1, endLine: 1, lines: ['标题'] },
   * //   { content: '第一行\n第二行', startLine: 3, endLine: 4, lines: ['第一行', '第二行'] },
   * // ]
   * ```
   */
  static split(text: string): ParagraphRecord[] {
    const paragraphs: ParagraphRecord[] = [];
    let currentLine = 1;

    for (const chunk of text.split('\n\n')) {
      const content = chunk.trim();
      if (!content) {
        currentLine += 1;
        continue;
      }

      const lines = content.split('\n');
      const startLine = currentLine;
      const endLine = startLine + lines.length - 1;
      paragraphs.push({ content, startLine, endLine, lines });

      // Skip the blank separator line
      currentLine = endLine + 2;
    }

    return paragraphs;
  }

  /**
   * Paragraph whose line range contains the given line, if any
   */
  static findByLine(
    paragraphs: readonly ParagraphRecord[],
    lineNum: number,
  ): ParagraphRecord | null {
    return (
      paragraphs.find(
        (paragraph) =>
          paragraph.startLine <= lineNum && lineNum <= paragraph.endLine,
      ) ?? null
    );
  }
}
