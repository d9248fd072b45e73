/**
 * Location of a reference inside the document
 *
 * @interface MatchLineInfo
 */
export interface MatchLineInfo {
  /**
   * Absolute source line number of the match
   * @type {number}
   */
  lineNumber: number;

  /**
   * Trimmed content of the matched line
   * @type {string}
   */
  content: string;

  /**
   * Character offset of the match within the paragraph content
   * @type {number}
   */
  charPositionInParagraph: number;
}

/**
 * In-text reference to a figure
 *
 * Example: the "图2" in "如图2所示经济持续下降"
 *
 * @interface Reference
 */
export interface Reference {
  /**
   * Figure reference text as it appears in the paragraph (e.g., "图2", "Fig. 3")
   * @type {string}
   */
  referenceText: string;

  /**
   * Whether the searched candidate equals the reference text
   * @type {boolean}
   */
  isExactMatch: boolean;

  /**
   * Line where the reference was found
   * @type {MatchLineInfo}
   */
  matchLineInfo: MatchLineInfo;

  /**
   * Full content of the paragraph containing the reference
   * @type {string}
   */
  paragraphContent: string;

  /**
   * Number of lines in that paragraph
   * @type {number}
   */
  totalLinesInParagraph: number;
}

/**
 * Caption of an image together with the in-text references found for it
 *
 * Created by the document pipeline. `referenceCount === 0` means no
 * reference has been found yet.
 *
 * @interface CaptionReference
 */
export interface CaptionReference {
  /**
   * Figure identifier taken from the caption (e.g., "图3", "Figure 2.1")
   * @type {string}
   */
  captionPart: string;

  /**
   * Number of entries in `references`
   * @type {number}
   */
  referenceCount: number;

  /**
   * References found in the document text
   * @type {Reference[]}
   */
  references: Reference[];
}
