import { SEARCH } from '../config/constants';

const ELLIPSIS = '...';

/**
 * Lowercase `text` without changing its length: characters whose lowercase
 * form is longer (`İ`) are left as they are, so indexes into the result
 * point at the same characters of `text`.
 */
export function foldCase(text: string): string {
  let folded = '';
  for (const char of text) {
    const lower = char.toLowerCase();
    folded += lower.length === char.length ? lower : char;
  }
  return folded;
}

/**
 * Window of `maxLength` characters around the first case-insensitive match
 * of `query`, with `...` on every side that was cut. Without a match the
 * window starts at the beginning of the text.
 */
export function createSnippet(
  text: string,
  query: string,
  maxLength: number = SEARCH.SNIPPET_LENGTH,
): string {
  const index = query ? foldCase(text).indexOf(foldCase(query)) : -1;
  if (index === -1) {
    return text.length > maxLength
      ? text.slice(0, maxLength) + ELLIPSIS
      : text;
  }

  let start = Math.max(0, index - Math.floor(maxLength / 2));
  const end = Math.min(text.length, start + maxLength);
  if (end - start < maxLength) {
    start = Math.max(0, end - maxLength);
  }

  return (
    (start > 0 ? ELLIPSIS : '') +
    text.slice(start, end) +
    (end < text.length ? ELLIPSIS : '')
  );
}
