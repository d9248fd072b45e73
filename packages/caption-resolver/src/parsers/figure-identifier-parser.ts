import type { CaptionReference } from '@figref/model';

import { FIGURE_IDENTIFIER_MATCHER } from '../patterns/caption-patterns';

/**
 * FigureIdentifierParser
 *
 * Pulls the figure identifier (e.g. "图3", "Figure 2.1") out of a caption
 * line. Noise glued to the number stays attached ("图22015-2016年" yields
 * "图22015-2016"); CaptionResolver strips it later.
 */
export class FigureIdentifierParser {
  /**
   * @returns The first figure identifier in the text, or null
   */
  static extract(text: string): string | null {
    return FIGURE_IDENTIFIER_MATCHER.exec(text)?.[0] ?? null;
  }

  /**
   * Create an empty caption reference for a caption line
   *
   * @returns null when the line holds no figure identifier
   */
  static toCaptionReference(captionLine: string): CaptionReference | null {
    const captionPart = this.extract(captionLine);
    if (!captionPart) {
      return null;
    }
    return { captionPart, referenceCount: 0, references: [] };
  }
}
