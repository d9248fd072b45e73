/**
 * @figref/caption-resolver
 *
 * Recovers in-text figure references for captions whose figure number was
 * corrupted during document extraction.
 *
 * ## Key Features
 *
 * - Caption reference resolution (right-truncation search + numeric tie-break)
 * - Figure identifier extraction from caption lines
 * - Paragraph segmentation with source line tracking
 * - Boundary validation for pipeline records
 *
 * @packageDocumentation
 */

export { CaptionResolver } from './caption-resolver';
export type { CaptionResolverOptions } from './caption-resolver';
export type {
  CandidatePair,
  CaptionResolution,
  ResolutionContext,
  ResolvedCaption,
  UnresolvedCaption,
  UnresolvedReason,
} from './types';
export { CAPTION_RESOLVER } from './config/constants';
export { DigitRunDetector } from './detectors/digit-run-detector';
export { CandidateGenerator } from './generators/candidate-generator';
export { LineLocator } from './locators/line-locator';
export { ReferenceMatcher } from './matchers/reference-matcher';
export type { ReferenceMatcherOptions } from './matchers/reference-matcher';
export { BestCandidateSelector } from './selectors/best-candidate-selector';
export {
  CAPTION_PATTERNS,
  CAPTION_REFERENCE_MATCHER,
  FIGURE_IDENTIFIER_MATCHER,
  FIGURE_IDENTIFIER_PATTERNS,
  compileCaptionPatterns,
} from './patterns/caption-patterns';
export type { CaptionPattern } from './patterns/caption-patterns';
export { ParagraphSegmenter } from './segmenters/paragraph-segmenter';
export { FigureIdentifierParser } from './parsers/figure-identifier-parser';
export {
  CaptionReferenceSchema,
  MatchLineInfoSchema,
  ParagraphRecordSchema,
  ReferenceSchema,
  ResolutionContextSchema,
  parseCaptionReference,
  parseResolutionContext,
} from './validators/input-schemas';
export { InputValidationError, PatternCompileError } from './errors';
