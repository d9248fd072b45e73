/**
 * Configuration constants for CaptionResolver
 */
export const CAPTION_RESOLVER = {
  /**
   * Consecutive digits a caption needs before resolution is attempted
   */
  MIN_DIGIT_RUN: 3,

  /**
   * Characters inspected from each occurrence when validating it as a figure reference
   */
  MATCH_WINDOW_LENGTH: 20,

  /**
   * Shortest candidate that is still matched against paragraphs
   */
  MIN_CANDIDATE_LENGTH: 2,
} as const;
