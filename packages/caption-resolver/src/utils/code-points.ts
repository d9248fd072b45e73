/**
 * Length of the text in code points, so an astral character counts once
 */
export function codePointLength(text: string): number {
  return Array.from(text).length;
}

/**
 * Takes up to `count` code points starting at a UTF-16 index.
 *
 * `start` is where a match begins (e.g. `RegExpMatchArray.index`), which is
 * always a code point boundary.
 *
 * @example
 * ```typescript
 * sliceCodePoints('a𠀀bc', 1, 2); // '𠀀b'
 * ```
 */
export function sliceCodePoints(
  text: string,
  start: number,
  count: number,
): string {
  let end = start;
  for (let taken = 0; taken < count && end < text.length; taken++) {
    const codePoint = text.codePointAt(end) ?? 0;
    end += codePoint > 0xffff ? 2 : 1;
  }
  return text.slice(start, end);
}
