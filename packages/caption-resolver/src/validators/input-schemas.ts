import type { CaptionReference, ParagraphRecord, Reference } from '@figref/model';

import type { ResolutionContext } from '../types';

import { z } from 'zod';

import { InputValidationError } from '../errors/input-validation-error';

/**
 * Schemas for records exchanged with the document pipeline.
 *
 * The pipeline writes snake_case keys; each schema parses that shape and
 * transforms it into the camelCase model.
 */

export const MatchLineInfoSchema = z.object({
  line_number: z.number().int(),
  content: z.string(),
  char_position_in_paragraph: z.number().int().nonnegative(),
});

export const ReferenceSchema = z
  .object({
    reference_text: z.string(),
    is_exact_match: z.boolean(),
    match_line_info: MatchLineInfoSchema,
    paragraph_content: z.string(),
    total_lines_in_paragraph: z.number().int().nonnegative(),
  })
  .transform(
    (value): Reference => ({
      referenceText: value.reference_text,
      isExactMatch: value.is_exact_match,
      matchLineInfo: {
        lineNumber: value.match_line_info.line_number,
        content: value.match_line_info.content,
        charPositionInParagraph:
          value.match_line_info.char_position_in_paragraph,
      },
      paragraphContent: value.paragraph_content,
      totalLinesInParagraph: value.total_lines_in_paragraph,
    }),
  );

export const CaptionReferenceSchema = z
  .object({
    caption_part: z.string(),
    reference_count: z.number().int().nonnegative(),
    references: z.array(ReferenceSchema).default([]),
  })
  .transform(
    (value): CaptionReference => ({
      captionPart: value.caption_part,
      referenceCount: value.reference_count,
      references: value.references,
    }),
  );

export const ParagraphRecordSchema = z
  .object({
    content: z.string(),
    start_line: z.number().int(),
    end_line: z.number().int(),
    lines: z.array(z.string()),
  })
  .refine((value) => value.start_line <= value.end_line, {
    message: 'start_line must not exceed end_line',
    path: ['end_line'],
  })
  .transform(
    (value): ParagraphRecord => ({
      content: value.content,
      startLine: value.start_line,
      endLine: value.end_line,
      lines: value.lines,
    }),
  );

export const ResolutionContextSchema = z
  .object({
    paragraph_mapping: z.array(ParagraphRecordSchema),
    image_identifier: z.string(),
    image_line_num: z.number().int(),
  })
  .transform(
    (value): ResolutionContext => ({
      paragraphs: value.paragraph_mapping,
      imageIdentifier: value.image_identifier,
      imageLineNum: value.image_line_num,
    }),
  );

/**
 * Parse a snake_case caption reference
 *
 * @throws {InputValidationError} When the input does not match the schema
 */
export function parseCaptionReference(input: unknown): CaptionReference {
  const result = CaptionReferenceSchema.safeParse(input);
  if (!result.success) {
    throw InputValidationError.fromZodError(
      'Invalid caption reference',
      result.error,
    );
  }
  return result.data;
}

/**
 * Parse a snake_case resolution context
 *
 * @throws {InputValidationError} When the input does not match the schema
 */
export function parseResolutionContext(input: unknown): ResolutionContext {
  const result = ResolutionContextSchema.safeParse(input);
  if (!result.success) {
    throw InputValidationError.fromZodError(
      'Invalid resolution context',
      result.error,
    );
  }
  return result.data;
}
