import { PatternCompileError } from '../errors/pattern-compile-error';

/**
 * Named regular expression source for one caption convention
 */
export interface CaptionPattern {
  name: string;
  source: string;
}

/**
 * Figure reference conventions accepted when validating a candidate occurrence.
 * Chinese: 图2, 图 A 3.1, 图5-2
 * English: Figure 2, Figure 3.1, Fig. 4, Fig 4-1
 * Digits may be full-width (图２) or of any other script.
 *
 * Order matters only between alternatives starting at the same position.
 */
export const CAPTION_PATTERNS: readonly CaptionPattern[] = [
  {
    name: 'cjk',
    source: String.raw`图\s*[a-zA-Z]?\s*\p{Nd}+(?:\s*[.\-]\s*\p{Nd}+)*\s*`,
  },
  {
    name: 'figure',
    source: String.raw`Figure\s*\p{Nd}+(?:\s*[.\-]\s*\p{Nd}+\s*)*`,
  },
  {
    name: 'fig',
    source: String.raw`Fig\.?\s*\p{Nd}+(?:\s*[.\-]\s*\p{Nd}+\s*)*`,
  },
];

/**
 * Conventions recognised when pulling a figure identifier out of a caption line.
 * Separators must not be surrounded by whitespace here.
 */
export const FIGURE_IDENTIFIER_PATTERNS: readonly CaptionPattern[] = [
  {
    name: 'cjk',
    source: String.raw`图\s*[a-zA-Z]?\s*\p{Nd}+(?:[.\-]\p{Nd}+)*\p{Nd}*`,
  },
  {
    name: 'figure',
    source: String.raw`Figure\s*\p{Nd}+(?:[.\-]\p{Nd}+)*\p{Nd}*`,
  },
  {
    name: 'fig',
    source: String.raw`Fig\.?\s*\p{Nd}+(?:[.\-]\p{Nd}+)*\p{Nd}*`,
  },
];

/**
 * Compiles a pattern set into one case-insensitive alternation.
 * Sources are compiled in Unicode mode, so `\p{Nd}` accepts digits of any script.
 *
 * The leftmost match across all patterns wins, as with a single regex.
 *
 * @throws {PatternCompileError} When a pattern or the combined set is invalid
 */
export function compileCaptionPatterns(
  patterns: readonly CaptionPattern[],
): RegExp {
  if (patterns.length === 0) {
    throw new PatternCompileError('Caption pattern set is empty');
  }

  for (const pattern of patterns) {
    try {
      new RegExp(pattern.source, 'iu');
    } catch (error) {
      throw PatternCompileError.fromError(
        `Invalid caption pattern "${pattern.name}"`,
        error,
      );
    }
  }

  const source = patterns.map((pattern) => `(?:${pattern.source})`).join('|');
  try {
    return new RegExp(source, 'iu');
  } catch (error) {
    throw PatternCompileError.fromError(
      'Failed to combine caption patterns',
      error,
    );
  }
}

/**
 * Compiled once at module load; a defect in the constants above fails here.
 */
export const CAPTION_REFERENCE_MATCHER = compileCaptionPatterns(CAPTION_PATTERNS);

export const FIGURE_IDENTIFIER_MATCHER = compileCaptionPatterns(
  FIGURE_IDENTIFIER_PATTERNS,
);
