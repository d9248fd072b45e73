import type { LoggerMethods } from '@figref/logger';
import type { ParagraphRecord, Reference } from '@figref/model';

import { CAPTION_RESOLVER } from '../config/constants';
import { LineLocator } from '../locators/line-locator';
import { CAPTION_REFERENCE_MATCHER } from '../patterns/caption-patterns';
import { codePointLength, sliceCodePoints } from '../utils/code-points';
import { escapeRegExp } from '../utils/digits';

/**
 * ReferenceMatcher options
 */
export interface ReferenceMatcherOptions {
  /**
   * Code points inspected from each occurrence (default: 20)
   */
  windowLength?: number;

  /**
   * Pattern an occurrence window must contain to count as a figure reference
   * (default: CAPTION_REFERENCE_MATCHER)
   */
  captionMatcher?: RegExp;
}

/**
 * ReferenceMatcher
 *
 * Finds in-text figure references for one candidate string.
 *
 * ## Algorithm
 *
 * 1. Skip the paragraph that contains the image line
 * 2. Find every case-insensitive occurrence of the candidate
 * 3. Accept an occurrence if a caption pattern matches inside the window
 *    starting at it; the matched text becomes the reference text
 * 4. Attach line info, dropping occurrences that cannot be placed on a line
 *
 * The window length, offsets and `charPositionInParagraph` count code points,
 * so a character outside the BMP occupies one position.
 */
export class ReferenceMatcher {
  private readonly windowLength: number;
  private readonly captionMatcher: RegExp;

  constructor(
    private readonly logger: LoggerMethods,
    options?: ReferenceMatcherOptions,
  ) {
    this.windowLength =
      options?.windowLength ?? CAPTION_RESOLVER.MATCH_WINDOW_LENGTH;
    const matcher = options?.captionMatcher ?? CAPTION_REFERENCE_MATCHER;
    // A global or sticky flag would carry lastIndex between windows
    this.captionMatcher = new RegExp(
      matcher.source,
      matcher.flags.replace(/[gy]/g, ''),
    );
  }

  /**
   * Collect references to `candidate` in every paragraph except the one
   * holding the image, in paragraph order then offset order.
   */
  match(
    candidate: string,
    paragraphs: readonly ParagraphRecord[],
    imageLineNum: number,
  ): Reference[] {
    const references: Reference[] = [];
    const occurrencePattern = new RegExp(escapeRegExp(candidate), 'gi');

    for (const paragraph of paragraphs) {
      if (this.containsLine(paragraph, imageLineNum)) {
        continue;
      }

      for (const occurrence of paragraph.content.matchAll(occurrencePattern)) {
        const reference = this.toReference(
          candidate,
          paragraph,
          occurrence.index ?? 0,
        );
        if (reference) {
          references.push(reference);
        }
      }
    }

    return references;
  }

  /**
   * Validate one occurrence and build its Reference
   */
  private toReference(
    candidate: string,
    paragraph: ParagraphRecord,
    index: number,
  ): Reference | null {
    const window = sliceCodePoints(paragraph.content, index, this.windowLength);
    const captionMatch = this.captionMatcher.exec(window);
    if (!captionMatch) {
      return null;
    }

    const offset = codePointLength(paragraph.content.slice(0, index));
    const matchLineInfo = LineLocator.locate(paragraph, offset);
    if (!matchLineInfo) {
      this.logger.debug(
        `[ReferenceMatcher] Offset ${offset} not found in lines of paragraph ${paragraph.startLine}-${paragraph.endLine}, skipping`,
      );
      return null;
    }

    const referenceText = captionMatch[0];
    return {
      referenceText,
      isExactMatch: candidate === referenceText,
      matchLineInfo,
      paragraphContent: paragraph.content,
      totalLinesInParagraph: paragraph.lines.length,
    };
  }

  private containsLine(paragraph: ParagraphRecord, lineNum: number): boolean {
    return paragraph.startLine <= lineNum && lineNum <= paragraph.endLine;
  }
}
