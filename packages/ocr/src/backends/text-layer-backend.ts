import type { LoggerMethods } from '@pagemill/logger';

import type { TextLayerOptions } from '../processors/text-layer-preprocessor';
import type { OcrBackend, PageInput, PageResult } from './ocr-backend';

import { join } from 'node:path';

import { PdfTextExtractor } from '../processors/pdf-text-extractor';
import { TextLayerPreprocessor } from '../processors/text-layer-preprocessor';
import { cleanMarkdownText } from '../utils/markdown-cleaner';

/**
 * Plain-text backend: OCRmyPDF adds a text layer to the page PDF, which is
 * then read back with `pdftotext`. Produces no images.
 */
export class TextLayerBackend implements OcrBackend {
  readonly kind = 'text-layer' as const;

  private readonly preprocessor: TextLayerPreprocessor;
  private readonly textExtractor: PdfTextExtractor;

  constructor(
    private readonly logger: LoggerMethods,
    private readonly preset: TextLayerOptions,
  ) {
    this.preprocessor = new TextLayerPreprocessor(logger);
    this.textExtractor = new PdfTextExtractor(logger);
  }

  async process(input: PageInput): Promise<PageResult> {
    const ocrPdfPath = join(input.workDir, `page-${input.pageNumber}-ocr.pdf`);
    await this.preprocessor.apply(input.pdfPath, ocrPdfPath, this.preset);

    const rawText = await this.textExtractor.extractPageText(ocrPdfPath, 1);
    const markdown = cleanMarkdownText(rawText);

    this.logger.debug(
      `[TextLayerBackend] Page ${input.pageNumber}: ${rawText.length} characters, ${markdown.length} after cleaning`,
    );

    return { rawText, markdown, images: [] };
  }
}
