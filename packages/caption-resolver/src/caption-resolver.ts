import type { LoggerMethods } from '@figref/logger';
import type { CaptionReference } from '@figref/model';

import { createSilentLogger } from '@figref/logger';

import type {
  CandidatePair,
  CaptionResolution,
  ResolutionContext,
  UnresolvedReason,
} from './types';

import { CAPTION_RESOLVER } from './config/constants';
import { DigitRunDetector } from './detectors/digit-run-detector';
import { CandidateGenerator } from './generators/candidate-generator';
import {
  ReferenceMatcher,
  type ReferenceMatcherOptions,
} from './matchers/reference-matcher';
import { BestCandidateSelector } from './selectors/best-candidate-selector';

/**
 * CaptionResolver options
 */
export interface CaptionResolverOptions extends ReferenceMatcherOptions {
  /**
   * Consecutive digits required before a caption is resolved (default: 3)
   */
  minDigitRun?: number;
}

/**
 * CaptionResolver
 *
 * Recovers the figure reference of a caption fragment that found no
 * reference in the document, typically because noise was glued to the
 * figure number (e.g. "图22015-2016" for "图2" followed by a year range).
 *
 * ## Algorithm
 *
 * 1. Gate: the caption has no references yet and holds a long digit run
 * 2. Search: match every right-truncated candidate against the document,
 *    keeping each candidate that produced references
 * 3. Select: the candidate numerically closest to the image index wins
 *
 * `resolve` reports the outcome without touching its input; `correct`
 * writes a successful outcome back into the caption reference. Without a
 * logger it logs nothing.
 */
export class CaptionResolver {
  private readonly minDigitRun: number;
  private readonly matcher: ReferenceMatcher;

  constructor(
    private readonly logger: LoggerMethods = createSilentLogger(),
    options?: CaptionResolverOptions,
  ) {
    this.minDigitRun = options?.minDigitRun ?? CAPTION_RESOLVER.MIN_DIGIT_RUN;
    this.matcher = new ReferenceMatcher(logger, options);
  }

  /**
   * Resolve a caption reference against the document
   */
  resolve(
    captionReference: Readonly<CaptionReference>,
    context: ResolutionContext,
  ): CaptionResolution {
    const reason = this.checkGate(captionReference);
    if (reason) {
      return this.unresolved(captionReference, reason);
    }

    const { captionPart } = captionReference;
    this.logger.debug(
      `[CaptionResolver] Searching candidates for "${captionPart}" (${context.imageIdentifier})`,
    );

    const pairs: CandidatePair[] = [];
    for (const candidate of CandidateGenerator.generate(captionPart)) {
      const references = this.matcher.match(
        candidate,
        context.paragraphs,
        context.imageLineNum,
      );
      if (references.length > 0) {
        this.logger.debug(
          `[CaptionResolver] Candidate "${candidate}" matched ${references.length} references`,
        );
        pairs.push({ candidate, references });
      }
    }

    const best = BestCandidateSelector.select(pairs, context.imageIdentifier);
    if (!best) {
      this.logger.debug(
        `[CaptionResolver] No candidate of "${captionPart}" matched the document`,
      );
      return this.unresolved(captionReference, 'no-match');
    }

    this.logger.info(
      `[CaptionResolver] Resolved "${captionPart}" to "${best.candidate}" with ${best.references.length} references (${pairs.length} candidates matched)`,
    );

    return {
      resolved: true,
      state: 'resolved',
      captionPart: best.candidate,
      referenceCount: best.references.length,
      references: best.references,
    };
  }

  /**
   * Resolve and write a successful result into the caption reference
   *
   * @returns Whether the caption reference was changed
   */
  correct(
    captionReference: CaptionReference,
    context: ResolutionContext,
  ): boolean {
    const resolution = this.resolve(captionReference, context);
    if (!resolution.resolved) {
      return false;
    }

    captionReference.captionPart = resolution.captionPart;
    captionReference.references = resolution.references;
    captionReference.referenceCount = resolution.referenceCount;
    return true;
  }

  /**
   * Correct several caption references of one image against the same document
   *
   * @returns Number of caption references changed
   */
  correctAll(
    captionReferences: CaptionReference[],
    context: ResolutionContext,
  ): number {
    let corrected = 0;
    for (const captionReference of captionReferences) {
      if (this.correct(captionReference, context)) {
        corrected++;
      }
    }

    if (captionReferences.length > 0) {
      this.logger.info(
        `[CaptionResolver] Corrected ${corrected} / ${captionReferences.length} caption references for ${context.imageIdentifier}`,
      );
    }
    return corrected;
  }

  private checkGate(
    captionReference: Readonly<CaptionReference>,
  ): UnresolvedReason | null {
    if (captionReference.referenceCount !== 0) {
      return 'already-referenced';
    }
    if (!captionReference.captionPart) {
      return 'empty-caption';
    }
    if (
      !DigitRunDetector.hasDigitRun(
        captionReference.captionPart,
        this.minDigitRun,
      )
    ) {
      return 'no-digit-run';
    }
    return null;
  }

  private unresolved(
    captionReference: Readonly<CaptionReference>,
    reason: UnresolvedReason,
  ): CaptionResolution {
    return {
      resolved: false,
      state: 'unresolved',
      reason,
      captionPart: captionReference.captionPart,
      referenceCount: captionReference.referenceCount,
      references: captionReference.references,
    };
  }
}
