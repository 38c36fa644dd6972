import type { LoggerMethods } from '@pagemill/logger';

import { spawnAsync } from '@pagemill/shared';

import { PAGE_RENDERER } from '../config/constants';

/** Options for rendering a single page */
export interface RenderPageOptions {
  /** 0-based page index inside the PDF (default: 0) */
  pageIndex?: number;
  /** Multiple of 72 DPI (default: 2) */
  zoom?: number;
  /** Compression quality for lossy formats */
  quality?: number;
}

/**
 * Renders one page of a PDF to a raster image using ImageMagick.
 * The output format follows the extension of `outputPath`.
 *
 * ## System Requirements
 * - ImageMagick (`magick`)
 * - Ghostscript (PDF delegate of ImageMagick)
 */
export class PageRenderer {
  constructor(private readonly logger: LoggerMethods) {}

  /**
   * Render a page and return the written path.
   */
  async renderPage(
    pdfPath: string,
    outputPath: string,
    options: RenderPageOptions = {},
  ): Promise<string> {
    const pageIndex = options.pageIndex ?? 0;
    const zoom = options.zoom ?? PAGE_RENDERER.DEFAULT_ZOOM;
    const dpi = Math.round(zoom * PAGE_RENDERER.BASE_DPI);

    this.logger.debug(
      `[PageRenderer] Rendering page ${pageIndex + 1} of ${pdfPath} at ${dpi} DPI`,
    );

    const result = await spawnAsync('magick', [
      '-density',
      dpi.toString(),
      `${pdfPath}[${pageIndex}]`,
      '-background',
      'white',
      '-alpha',
      'remove',
      '-alpha',
      'off',
      ...(options.quality !== undefined
        ? ['-quality', options.quality.toString()]
        : []),
      outputPath,
    ]);

    if (result.code !== 0) {
      throw new Error(
        `[PageRenderer] Failed to render page ${pageIndex + 1}: ${result.stderr || 'Unknown error'}`,
      );
    }

    return outputPath;
  }

  /**
   * Render the first page as a JPEG cover image.
   */
  async renderThumbnail(pdfPath: string, outputPath: string): Promise<string> {
    return this.renderPage(pdfPath, outputPath, {
      pageIndex: 0,
      zoom: PAGE_RENDERER.DEFAULT_ZOOM,
      quality: PAGE_RENDERER.THUMBNAIL_QUALITY,
    });
  }
}
