import type { ImageUrlResolver } from './reference-parser';

/** Matches every placeholder token and captures its region index */
export const IMAGE_PLACEHOLDER_PATTERN = /__IMAGE_PLACEHOLDER_(\d+)__/g;

/**
 * Sentinel standing in for the reference of an image that is not stored yet.
 */
export function imagePlaceholder(regionIndex: number): string {
  return `__IMAGE_PLACEHOLDER_${regionIndex}__`;
}

/**
 * Resolver for {@link parseReferences} that emits placeholders instead of
 * final URLs. The placeholder reconciler substitutes them after the
 * extracted images have been persisted.
 */
export const placeholderUrlResolver: ImageUrlResolver = (imageIndex) =>
  imagePlaceholder(imageIndex);
