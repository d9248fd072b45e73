import type { ParagraphRecord, Reference } from '@figref/model';

/**
 * Candidate that produced at least one reference
 */
export interface CandidatePair {
  /**
   * Right-truncated caption fragment
   */
  candidate: string;

  /**
   * References found for the candidate, in document order
   */
  references: Reference[];
}

/**
 * Document context a caption is resolved against
 */
export interface ResolutionContext {
  /**
   * Paragraphs of the document, never mutated
   */
  paragraphs: readonly ParagraphRecord[];

  /**
   * Image file name, conventionally zero-padded (e.g., "000012.jpg")
   */
  imageIdentifier: string;

  /**
   * Source line of the image marker (1-based)
   */
  imageLineNum: number;
}

/**
 * Why a caption was left as it was
 *
 * - already-referenced: the caption already has references
 * - empty-caption: there is no caption fragment to work with
 * - no-digit-run: the fragment lacks a long enough digit run
 * - no-match: no candidate matched anything in the document
 */
export type UnresolvedReason =
  | 'already-referenced'
  | 'empty-caption'
  | 'no-digit-run'
  | 'no-match';

/**
 * Caption whose reference was recovered
 */
export interface ResolvedCaption {
  resolved: true;
  state: 'resolved';
  captionPart: string;
  referenceCount: number;
  references: Reference[];
}

/**
 * Caption left untouched; carries the input values unchanged
 */
export interface UnresolvedCaption {
  resolved: false;
  state: 'unresolved';
  reason: UnresolvedReason;
  captionPart: string;
  referenceCount: number;
  references: Reference[];
}

export type CaptionResolution = ResolvedCaption | UnresolvedCaption;
