import type { LoggerMethods } from '@pagemill/logger';

import { spawnAsync } from '@pagemill/shared';

import { PdfOpenError } from '../errors/pdf-errors';

/**
 * Reads page counts and text layers with Poppler.
 *
 * ## System Requirements
 * - Poppler utils (`pdfinfo`, `pdftotext`)
 */
export class PdfTextExtractor {
  constructor(private readonly logger: LoggerMethods) {}

  /**
   * Total page count of a PDF using pdfinfo.
   *
   * @throws PdfOpenError when pdfinfo cannot read the file or reports no pages
   */
  async getPageCount(pdfPath: string): Promise<number> {
    const result = await spawnAsync('pdfinfo', [pdfPath]);
    if (result.code !== 0) {
      throw new PdfOpenError(pdfPath, result.stderr.trim() || 'Unknown error');
    }

    const match = result.stdout.match(/^Pages:\s+(\d+)/m);
    const pageCount = match ? parseInt(match[1], 10) : 0;
    if (pageCount === 0) {
      throw new PdfOpenError(pdfPath, 'no pages');
    }

    this.logger.debug(`[PdfTextExtractor] ${pdfPath} has ${pageCount} pages`);
    return pageCount;
  }

  /**
   * Extract the text layer of a single page using `pdftotext -layout`.
   * Returns an empty string on failure (logged as warning).
   */
  async extractPageText(pdfPath: string, page: number): Promise<string> {
    const result = await spawnAsync('pdftotext', [
      '-f',
      page.toString(),
      '-l',
      page.toString(),
      '-layout',
      pdfPath,
      '-',
    ]);

    if (result.code !== 0) {
      this.logger.warn(
        `[PdfTextExtractor] pdftotext failed for page ${page}: ${result.stderr || 'Unknown error'}`,
      );
      return '';
    }

    return result.stdout;
  }
}
