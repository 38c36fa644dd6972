import type { LoggerMethods } from '@pagemill/logger';

import { spawnAsync } from '@pagemill/shared';
import { existsSync, mkdirSync, readdirSync } from 'node:fs';
import { join } from 'node:path';

/** One single-page PDF written by the splitter */
export interface SplitPage {
  /** 1-based */
  pageNumber: number;
  path: string;
}

const PAGE_FILE_PATTERN = /^page-(\d+)\.pdf$/;

/**
 * Splits a PDF into one file per page with Poppler's `pdfseparate`.
 *
 * ## System Requirements
 * - Poppler utils (`pdfseparate`)
 */
export class PdfSplitter {
  constructor(private readonly logger: LoggerMethods) {}

  /**
   * Write `outputDir/page-<n>.pdf` for every page and return them in page order.
   */
  async split(pdfPath: string, outputDir: string): Promise<SplitPage[]> {
    if (!existsSync(outputDir)) {
      mkdirSync(outputDir, { recursive: true });
    }

    const result = await spawnAsync('pdfseparate', [
      pdfPath,
      join(outputDir, 'page-%d.pdf'),
    ]);

    if (result.code !== 0) {
      throw new Error(
        `[PdfSplitter] Failed to split PDF: ${result.stderr || 'Unknown error'}`,
      );
    }

    const pages = readdirSync(outputDir)
      .flatMap((file) => {
        const match = PAGE_FILE_PATTERN.exec(file);
        return match
          ? [{ pageNumber: parseInt(match[1], 10), path: join(outputDir, file) }]
          : [];
      })
      .sort((a, b) => a.pageNumber - b.pageNumber);

    this.logger.info(
      `[PdfSplitter] Split ${pdfPath} into ${pages.length} pages`,
    );

    return pages;
  }
}
