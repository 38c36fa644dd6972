import type { LoggerMethods } from '@pagemill/logger';
import type { ExtractedImage } from '@pagemill/model';

import { extname } from 'node:path';

import {
  IMAGE_PLACEHOLDER_PATTERN,
  imagePlaceholder,
} from '../parsers/image-placeholder';
import { cleanFilename } from '../utils/filename';

/** Any line that still carries a placeholder token, with its line break */
const ORPHAN_LINE_PATTERN = /^[^\n]*__IMAGE_PLACEHOLDER_\d+__[^\n]*(?:\n|$)/gm;

export interface ReconcileResult {
  markdown: string;
  /** Region indexes whose placeholder was replaced */
  substituted: number[];
  /** Region indexes whose line was removed */
  orphaned: number[];
}

/**
 * Addressable reference of a stored image: `/<id>/<filename>`.
 *
 * The filename is the slug of the alt text when one exists, otherwise the id,
 * with the extension of the stored file.
 */
export function imageReferencePath(
  image: Pick<ExtractedImage, 'id' | 'fileKey' | 'altText'>,
): string {
  const extension = extname(image.fileKey) || '.png';
  const slug = image.altText ? cleanFilename(image.altText) : '';
  return `/${image.id}/${slug || image.id}${extension}`;
}

/**
 * Second phase of image linking.
 *
 * The parser writes `__IMAGE_PLACEHOLDER_<i>__` for every image region. Once
 * the crops are stored, entry `i` of `references` holds the final reference of
 * region `i`, or `null` when that region could not be saved. Lines whose
 * placeholder has no reference are dropped from the Markdown.
 */
export class PlaceholderReconciler {
  constructor(private readonly logger: LoggerMethods) {}

  reconcile(
    markdown: string,
    references: ReadonlyArray<string | null>,
  ): ReconcileResult {
    const substituted: number[] = [];
    let result = markdown;

    for (const [regionIndex, reference] of references.entries()) {
      const token = imagePlaceholder(regionIndex);
      if (reference === null || !result.includes(token)) {
        continue;
      }
      result = result.replaceAll(token, () => reference);
      substituted.push(regionIndex);
    }

    const orphaned = [
      ...new Set(
        Array.from(result.matchAll(IMAGE_PLACEHOLDER_PATTERN), ([, index]) =>
          parseInt(index, 10),
        ),
      ),
    ].sort((a, b) => a - b);

    if (orphaned.length > 0) {
      result = result
        .replace(ORPHAN_LINE_PATTERN, '')
        .replace(/\n{3,}/g, '\n\n')
        .replace(/^\n+/, '')
        .replace(/\n{2,}$/, '\n');

      this.logger.warn(
        `[PlaceholderReconciler] Partial extraction: removed ${orphaned.length} image line(s) for regions ${orphaned.join(', ')}`,
      );
    }

    return { markdown: result, substituted, orphaned };
  }
}
