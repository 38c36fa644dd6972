import type { LoggerMethods } from '@pagemill/logger';
import type { ExtractedRegion, Reference } from '@pagemill/model';

import { spawnAsync } from '@pagemill/shared';
import { existsSync, mkdirSync, statSync } from 'node:fs';
import { join } from 'node:path';

import { REGION_EXTRACTOR } from '../config/constants';

/** Pixel box `[x1, y1, x2, y2]` */
export type PixelBox = [number, number, number, number];

/** Per-axis factors that map model coordinates to pixels */
export interface CoordinateScale {
  normalized: boolean;
  scaleX: number;
  scaleY: number;
}

export interface ImageDimensions {
  width: number;
  height: number;
}

/**
 * Decide once per page whether boxes are on the 0-1000 grid.
 *
 * Boxes count as normalized when the largest coordinate of every region is
 * within the grid while the image is larger than the grid on some axis.
 * A small page with pixel boxes is indistinguishable from a normalized one,
 * so small images are always treated as pixel space.
 */
export function detectCoordinateScale(
  references: readonly Reference[],
  dimensions: ImageDimensions,
): CoordinateScale {
  const grid = REGION_EXTRACTOR.NORMALIZED_GRID;
  const maxCoordinate = Math.max(
    0,
    ...references.flatMap((reference) => reference.boundingBox),
  );
  const normalized =
    maxCoordinate <= grid &&
    (dimensions.width > grid || dimensions.height > grid);

  return normalized
    ? {
        normalized,
        scaleX: dimensions.width / grid,
        scaleY: dimensions.height / grid,
      }
    : { normalized, scaleX: 1, scaleY: 1 };
}

/**
 * Map a model box to pixels. Returns `null` for boxes with fewer than four values.
 */
export function toPixelBox(
  boundingBox: readonly number[],
  scale: CoordinateScale,
): PixelBox | null {
  if (boundingBox.length < 4) {
    return null;
  }
  const [x1, y1, x2, y2] = boundingBox;
  if (!scale.normalized) {
    return [x1, y1, x2, y2];
  }
  return [
    Math.trunc(x1 * scale.scaleX),
    Math.trunc(y1 * scale.scaleY),
    Math.trunc(x2 * scale.scaleX),
    Math.trunc(y2 * scale.scaleY),
  ];
}

/**
 * Crops image regions found by grounding OCR out of the rendered page and
 * draws the debug overlay. Uses ImageMagick for cropping, drawing and
 * dimension queries.
 *
 * ## System Requirements
 * - ImageMagick 7 (`magick`)
 */
export class RegionImageExtractor {
  constructor(private readonly logger: LoggerMethods) {}

  /**
   * Crop every image-typed reference into `outputDir/image_<regionIndex>.png`.
   *
   * A region that cannot be cropped is logged and skipped; later regions are
   * still extracted, so the result may have gaps in `regionIndex`.
   */
  async extract(
    sourceImagePath: string,
    references: readonly Reference[],
    outputDir: string,
  ): Promise<ExtractedRegion[]> {
    const imageReferences = references.filter((r) => r.type === 'image');
    if (imageReferences.length === 0) {
      this.logger.debug('[RegionImageExtractor] No image regions to extract');
      return [];
    }

    const dimensions = await this.readDimensions(sourceImagePath);
    if (!dimensions) {
      this.logger.warn(
        `[RegionImageExtractor] Cannot read ${sourceImagePath}, skipping ${imageReferences.length} regions`,
      );
      return [];
    }

    if (!existsSync(outputDir)) {
      mkdirSync(outputDir, { recursive: true });
    }

    const scale = detectCoordinateScale(references, dimensions);
    this.logger.info(
      `[RegionImageExtractor] Extracting ${imageReferences.length} regions (${scale.normalized ? 'normalized' : 'pixel'} coordinates, ${dimensions.width}x${dimensions.height})`,
    );

    const regions: ExtractedRegion[] = [];
    for (const [regionIndex, reference] of imageReferences.entries()) {
      const region = await this.extractRegion(
        sourceImagePath,
        reference,
        regionIndex,
        scale,
        dimensions,
        outputDir,
      );
      if (region) {
        regions.push(region);
      }
    }

    this.logger.info(
      `[RegionImageExtractor] Extracted ${regions.length}/${imageReferences.length} regions`,
    );
    return regions;
  }

  /**
   * Draw every region's box and a `<n>: <type>` label onto a copy of the page.
   *
   * @returns the overlay path, or `null` when drawing failed
   */
  async renderOverlay(
    sourceImagePath: string,
    references: readonly Reference[],
    outputPath: string,
  ): Promise<string | null> {
    try {
      const dimensions = await this.readDimensions(sourceImagePath);
      if (!dimensions) {
        throw new Error(`cannot read ${sourceImagePath}`);
      }
      const scale = detectCoordinateScale(references, dimensions);

      const args = [
        sourceImagePath,
        '-strokewidth',
        String(REGION_EXTRACTOR.OVERLAY_STROKE_WIDTH),
      ];
      for (const [index, reference] of references.entries()) {
        const box = toPixelBox(reference.boundingBox, scale);
        if (!box) {
          continue;
        }
        const [x1, y1, x2, y2] = box;
        const color = overlayColor(reference.type);
        const labelY = Math.max(0, y1 - REGION_EXTRACTOR.OVERLAY_LABEL_OFFSET);
        args.push(
          '-stroke',
          color,
          '-fill',
          'none',
          '-draw',
          `rectangle ${x1},${y1} ${x2},${y2}`,
          '-stroke',
          'none',
          '-fill',
          color,
          '-draw',
          `text ${x1},${labelY} '${index + 1}: ${reference.type}'`,
        );
      }
      args.push(outputPath);

      const result = await spawnAsync('magick', args);
      if (result.code !== 0) {
        throw new Error(result.stderr || 'Unknown error');
      }
      return outputPath;
    } catch (error) {
      this.logger.warn(
        '[RegionImageExtractor] Failed to render overlay:',
        error instanceof Error ? error.message : error,
      );
      return null;
    }
  }

  /**
   * Pixel size of an image via `magick identify`. `null` when unreadable.
   */
  async readDimensions(imagePath: string): Promise<ImageDimensions | null> {
    const result = await spawnAsync('magick', [
      'identify',
      '-format',
      '%w %h',
      imagePath,
    ]);
    if (result.code !== 0 || !result.stdout.trim()) {
      return null;
    }

    const [width, height] = result.stdout.trim().split(' ').map(Number);
    if (!Number.isFinite(width) || !Number.isFinite(height)) {
      return null;
    }
    return { width, height };
  }

  private async extractRegion(
    sourceImagePath: string,
    reference: Reference,
    regionIndex: number,
    scale: CoordinateScale,
    dimensions: ImageDimensions,
    outputDir: string,
  ): Promise<ExtractedRegion | null> {
    const box = toPixelBox(reference.boundingBox, scale);
    if (!box) {
      this.logger.warn(
        `[RegionImageExtractor] Region ${regionIndex}: malformed box [${reference.boundingBox.join(',')}], skipping`,
      );
      return null;
    }

    const x1 = clamp(box[0], dimensions.width);
    const y1 = clamp(box[1], dimensions.height);
    const x2 = clamp(box[2], dimensions.width);
    const y2 = clamp(box[3], dimensions.height);
    const w = x2 - x1;
    const h = y2 - y1;
    if (w <= 0 || h <= 0) {
      this.logger.warn(
        `[RegionImageExtractor] Region ${regionIndex}: empty crop ${w}x${h}, skipping`,
      );
      return null;
    }

    const outputPath = join(outputDir, `image_${regionIndex}.png`);
    const result = await spawnAsync('magick', [
      sourceImagePath,
      '-crop',
      `${w}x${h}+${x1}+${y1}`,
      '+repage',
      outputPath,
    ]);
    if (result.code !== 0) {
      this.logger.warn(
        `[RegionImageExtractor] Region ${regionIndex}: failed to crop: ${result.stderr || 'Unknown error'}`,
      );
      return null;
    }

    const byteSize = existsSync(outputPath) ? statSync(outputPath).size : 0;
    if (byteSize === 0) {
      this.logger.warn(
        `[RegionImageExtractor] Region ${regionIndex}: crop produced an empty file, skipping`,
      );
      return null;
    }

    const saved = await this.readDimensions(outputPath);
    return {
      regionIndex,
      path: outputPath,
      byteSize,
      width: saved?.width ?? w,
      height: saved?.height ?? h,
    };
  }
}

function clamp(value: number, max: number): number {
  return Math.min(Math.max(value, 0), max);
}

function overlayColor(type: string): string {
  switch (type) {
    case 'image':
    case 'text':
    case 'sub_title':
    case 'title':
      return REGION_EXTRACTOR.OVERLAY_COLORS[type];
    default:
      return REGION_EXTRACTOR.OVERLAY_DEFAULT_COLOR;
  }
}
