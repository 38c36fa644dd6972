/** Bare page numbers: one to three digits and nothing else */
const PAGE_NUMBER_LINE = /^\d{1,3}$/;

/** Lines shorter than this are treated as running headers near the top */
const MIN_HEADER_LINE_LENGTH = 10;

/** Short lines are dropped until this many lines have been kept */
const HEADER_ZONE_LINES = 3;

/**
 * Remove page numbers and running headers from text-layer output.
 */
export function cleanMarkdownText(rawText: string): string {
  const kept: string[] = [];

  for (const line of rawText.split('\n')) {
    const trimmed = line.trim();
    if (PAGE_NUMBER_LINE.test(trimmed)) {
      continue;
    }
    if (
      trimmed.length < MIN_HEADER_LINE_LENGTH &&
      kept.length < HEADER_ZONE_LINES
    ) {
      continue;
    }
    kept.push(line);
  }

  return kept.join('\n');
}
