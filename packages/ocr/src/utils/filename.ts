/** Longest slug produced by {@link cleanFilename} */
export const MAX_FILENAME_LENGTH = 100;

/**
 * Turn free text (a title, an image caption) into a filename slug.
 *
 * Letters, digits, spaces, `-` and `_` survive; spaces become `-`.
 * Returns an empty string when nothing usable is left.
 */
export function cleanFilename(
  text: string,
  maxLength: number = MAX_FILENAME_LENGTH,
): string {
  return text
    .replace(/[^\p{L}\p{N} _-]/gu, '')
    .trim()
    .replace(/ /g, '-')
    .slice(0, maxLength);
}
