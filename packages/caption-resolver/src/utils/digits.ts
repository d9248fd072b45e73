const DIGIT_PATTERN = /\p{Nd}/u;
const SINGLE_DIGIT_PATTERN = /^\p{Nd}$/u;

/**
 * Whether a single character (one code point) is a Unicode decimal digit
 */
export function isDigit(char: string): boolean {
  return SINGLE_DIGIT_PATTERN.test(char);
}

/**
 * Whether the text contains at least one Unicode decimal digit
 */
export function containsDigit(text: string): boolean {
  return DIGIT_PATTERN.test(text);
}

/**
 * Numeric value of a decimal digit of any script.
 *
 * Decimal digits are encoded as contiguous 0-9 runs, so the value is the
 * distance from the start of the run modulo 10.
 */
export function digitValue(char: string): number {
  const codePoint = char.codePointAt(0) ?? 0;
  let zero = codePoint;
  while (zero > 0 && isDigit(String.fromCodePoint(zero - 1))) {
    zero--;
  }
  return (codePoint - zero) % 10;
}

/**
 * Concatenates every digit of the text and parses the result.
 *
 * Leading zeros vanish and text without digits yields 0n.
 * A bigint keeps long digit runs (e.g. "图22015-2016" → 220152016) exact.
 * Digits of other scripts count by value, so "图１２" gives 12n.
 *
 * @example
 * ```typescript
 * extractNumber('000012.jpg'); // 12n
 * extractNumber('Fig. 3-1'); // 31n
 * ```
 */
export function extractNumber(text: string): bigint {
  let digits = '';
  for (const char of text) {
    if (isDigit(char)) {
      digits += String(digitValue(char));
    }
  }
  return digits ? BigInt(digits) : 0n;
}

/**
 * Escapes RegExp metacharacters so the text matches literally
 */
export function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
