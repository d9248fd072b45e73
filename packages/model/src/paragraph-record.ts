/**
 * Paragraph of a segmented document
 *
 * Produced by paragraph segmentation and never mutated afterwards.
 * `lines.join('\n')` reconstructs `content`.
 *
 * @interface ParagraphRecord
 */
export interface ParagraphRecord {
  /**
   * Paragraph text, trimmed
   * @type {string}
   */
  content: string;

  /**
   * First source line of the paragraph (1-based, inclusive)
   * @type {number}
   */
  startLine: number;

  /**
   * Last source line of the paragraph (1-based, inclusive)
   * @type {number}
   */
  endLine: number;

  /**
   * Source lines that make up the paragraph
   * @type {string[]}
   */
  lines: string[];
}
