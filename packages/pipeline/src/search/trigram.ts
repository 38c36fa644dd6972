/**
 * Trigrams of a string, built like PostgreSQL's pg_trgm: lower-cased words of
 * letters and digits, each padded with two spaces in front and one behind.
 */
export function trigrams(text: string): Set<string> {
  const result = new Set<string>();
  const words = text.toLowerCase().match(/[\p{L}\p{N}]+/gu) ?? [];

  for (const word of words) {
    const padded = `  ${word} `;
    for (let i = 0; i + 3 <= padded.length; i++) {
      result.add(padded.slice(i, i + 3));
    }
  }

  return result;
}

/**
 * Shared trigrams over all distinct trigrams of both strings, 0 to 1.
 */
export function trigramSimilarity(a: string, b: string): number {
  const left = trigrams(a);
  const right = trigrams(b);
  if (left.size === 0 || right.size === 0) {
    return 0;
  }

  let shared = 0;
  for (const trigram of left) {
    if (right.has(trigram)) {
      shared++;
    }
  }
  return shared / (left.size + right.size - shared);
}
