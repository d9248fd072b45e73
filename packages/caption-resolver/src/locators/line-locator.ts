import type { MatchLineInfo, ParagraphRecord } from '@figref/model';

import { codePointLength } from '../utils/code-points';

/**
 * LineLocator
 *
 * Maps a character offset in a paragraph's content to the source line that
 * holds it. Each line owns its characters plus the newline that follows it.
 * Offsets and line lengths are counted in code points.
 */
export class LineLocator {
  /**
   * @param paragraph - Paragraph whose `content` the offset refers to
   * @param offset - 0-based code point offset into `paragraph.content`
   * @returns Line info, or null when `lines` does not account for the offset
   */
  static locate(
    paragraph: Pick<ParagraphRecord, 'lines' | 'startLine'>,
    offset: number,
  ): MatchLineInfo | null {
    let cumulative = 0;
    for (const [index, line] of paragraph.lines.entries()) {
      const lineLength = codePointLength(line) + 1;
      if (cumulative <= offset && offset < cumulative + lineLength) {
        return {
          lineNumber: paragraph.startLine + index,
          content: line.trim(),
          charPositionInParagraph: offset,
        };
      }
      cumulative += lineLength;
    }
    return null;
  }
}
