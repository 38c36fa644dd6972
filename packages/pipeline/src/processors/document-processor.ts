import type { LoggerMethods } from '@pagemill/logger';
import type { Document, OcrPreset } from '@pagemill/model';
import type { SplitPage } from '@pagemill/ocr';
import type { BackoffConfig } from '@pagemill/shared';

import type { DocumentRepository } from '../db/repositories/document-repository';
import type { PageRepository } from '../db/repositories/page-repository';
import type { OcrPresetService } from '../presets/preset-service';
import type { JobQueue } from '../queue/job-queue';
import type { Storage } from '../storage/storage';
import type { ProgressAggregator } from './progress-aggregator';

import {
  PageRenderer,
  PdfSplitter,
  PdfTextExtractor,
  TextLayerPreprocessor,
  assertPdfBytes,
} from '@pagemill/ocr';
import { ConcurrentPool, withRetry } from '@pagemill/shared';
import { readFileSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';

import { DOCUMENT_PROCESSOR } from '../config/constants';
import { DocumentNotFoundError } from '../errors/pipeline-errors';
import { pagePdfKey, thumbnailKey } from '../storage/storage-keys';
import { withWorkDir } from '../utils/work-dir';

/** The part of the job queue the document processor schedules through */
export type JobScheduler = Pick<JobQueue, 'enqueue'>;

export interface DocumentProcessorDeps {
  documents: DocumentRepository;
  pages: PageRepository;
  storage: Storage;
  ocrPresets: OcrPresetService;
  aggregator: ProgressAggregator;
  jobs: JobScheduler;
  extractor?: PdfTextExtractor;
  splitter?: PdfSplitter;
  renderer?: PageRenderer;
  textLayer?: TextLayerPreprocessor;
}

export interface DocumentProcessorOptions {
  /** Backoff for lookups of a document that is not visible yet */
  lookupBackoff?: Partial<BackoffConfig>;
  /** Pages written to storage at the same time while splitting */
  splitConcurrency?: number;
}

export interface ProcessDocumentOptions {
  /** Add a text layer with the default OCRmyPDF preset when the document names none */
  applyTextLayer?: boolean;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Opens an uploaded PDF, records its page count and fans out into
 * thumbnail, split and per-page jobs.
 */
export class DocumentProcessor {
  private readonly extractor: PdfTextExtractor;
  private readonly splitter: PdfSplitter;
  private readonly renderer: PageRenderer;
  private readonly textLayer: TextLayerPreprocessor;

  constructor(
    private readonly logger: LoggerMethods,
    private readonly deps: DocumentProcessorDeps,
    private readonly options: DocumentProcessorOptions = {},
  ) {
    this.extractor = deps.extractor ?? new PdfTextExtractor(logger);
    this.splitter = deps.splitter ?? new PdfSplitter(logger);
    this.renderer = deps.renderer ?? new PageRenderer(logger);
    this.textLayer = deps.textLayer ?? new TextLayerPreprocessor(logger);
  }

  /**
   * @throws DocumentNotFoundError when the document is still missing after retries
   * @throws PdfOpenError when the source PDF cannot be read; the document is `failed` by then
   */
  async process(
    documentId: string,
    options: ProcessDocumentOptions = {},
  ): Promise<void> {
    const document = await this.lookup(documentId);
    this.deps.documents.update(documentId, { status: 'processing' });
    this.logger.info(
      `[DocumentProcessor] Processing document ${documentId} (${document.title})`,
    );

    try {
      const pageCount = await withWorkDir('document', async (workDir) => {
        const sourcePath = join(workDir, 'source.pdf');
        writeFileSync(sourcePath, await this.deps.storage.open(document.sourceKey));

        const preset = this.textLayerPreset(document, options);
        if (preset) {
          await this.applyTextLayer(document, preset, sourcePath, workDir);
        }

        return this.extractor.getPageCount(sourcePath);
      });

      if (!this.deps.documents.setPageCountIfUnset(documentId, pageCount)) {
        this.logger.debug(
          `[DocumentProcessor] Document ${documentId} already has a page count`,
        );
      }
    } catch (error) {
      const message = errorMessage(error);
      this.logger.error(
        `[DocumentProcessor] Failed to open document ${documentId}: ${message}`,
      );
      this.failDocument(documentId, message);
      throw error;
    }

    this.deps.jobs.enqueue('generate-thumbnail', { documentId });
    this.deps.jobs.enqueue('split-document', { documentId });
  }

  /**
   * Render page 1 as the cover image. Failures are logged, never thrown.
   */
  async generateThumbnail(documentId: string): Promise<void> {
    const document = this.deps.documents.getById(documentId);

    try {
      const key = await withWorkDir('thumbnail', async (workDir) => {
        const pdfPath = join(workDir, 'source.pdf');
        writeFileSync(pdfPath, await this.deps.storage.open(document.sourceKey));

        const imagePath = await this.renderer.renderThumbnail(
          pdfPath,
          join(workDir, 'cover.jpg'),
        );
        const key = thumbnailKey(document);
        await this.deps.storage.save(key, readFileSync(imagePath));
        return key;
      });

      this.deps.documents.update(documentId, { thumbnailKey: key });
      this.logger.debug(
        `[DocumentProcessor] Stored thumbnail of ${documentId} at ${key}`,
      );
    } catch (error) {
      this.logger.warn(
        `[DocumentProcessor] Thumbnail for ${documentId} failed: ${errorMessage(error)}`,
      );
    }
  }

  /**
   * Split the source PDF into stored single-page PDFs and queue every page.
   * Running it again reuses the existing page records.
   *
   * A page that cannot be stored is marked `failed` without stopping its
   * siblings. When the PDF cannot be split at all the document is marked
   * `failed` and the error is rethrown.
   */
  async split(documentId: string): Promise<void> {
    const document = this.deps.documents.getById(documentId);

    try {
      const { total, queued } = await withWorkDir('split', async (workDir) => {
        const pdfPath = join(workDir, 'source.pdf');
        writeFileSync(pdfPath, await this.deps.storage.open(document.sourceKey));

        const splitPages = await this.splitter.split(
          pdfPath,
          join(workDir, 'pages'),
        );
        const outcomes = await ConcurrentPool.settle(
          splitPages,
          this.options.splitConcurrency ?? DOCUMENT_PROCESSOR.SPLIT_CONCURRENCY,
          (splitPage) => this.storePage(document, splitPage),
        );

        let queued = 0;
        outcomes.forEach((outcome, index) => {
          if (outcome.status === 'rejected') {
            this.failPage(
              document,
              splitPages[index].pageNumber,
              outcome.reason,
            );
          } else if (outcome.value) {
            queued++;
          }
        });
        return { total: splitPages.length, queued };
      });

      this.deps.aggregator.update(documentId);
      this.logger.info(
        `[DocumentProcessor] Split ${documentId} into ${total} pages, queued ${queued}`,
      );
    } catch (error) {
      const message = errorMessage(error);
      this.logger.error(
        `[DocumentProcessor] Failed to split document ${documentId}: ${message}`,
      );
      this.failDocument(documentId, message);
      throw error;
    }
  }

  private lookup(documentId: string): Promise<Document> {
    return withRetry(
      async () => this.deps.documents.getById(documentId),
      (error) => error instanceof DocumentNotFoundError,
      {
        logger: this.logger,
        label: `lookup of document ${documentId}`,
        baseDelayMs: DOCUMENT_PROCESSOR.LOOKUP_BASE_DELAY_MS,
        maxDelayMs: DOCUMENT_PROCESSOR.LOOKUP_MAX_DELAY_MS,
        maxAttempts: DOCUMENT_PROCESSOR.LOOKUP_MAX_RETRIES,
        jitterFraction: DOCUMENT_PROCESSOR.LOOKUP_JITTER,
        ...this.options.lookupBackoff,
      },
    );
  }

  private textLayerPreset(
    document: Document,
    options: ProcessDocumentOptions,
  ): OcrPreset | null {
    if (document.metadata.textLayerApplied === true) {
      return null;
    }

    if (document.ocrPresetId !== null) {
      const preset = this.deps.ocrPresets.get(document.ocrPresetId);
      if (preset) {
        return preset;
      }
      this.logger.warn(
        `[DocumentProcessor] OCR preset ${document.ocrPresetId} not found, using the default`,
      );
      return this.deps.ocrPresets.getDefault();
    }

    return options.applyTextLayer ? this.deps.ocrPresets.getDefault() : null;
  }

  /**
   * Replace the stored source with an OCRmyPDF-processed copy. On failure the
   * original PDF is kept and processing goes on.
   */
  private async applyTextLayer(
    document: Document,
    preset: OcrPreset,
    sourcePath: string,
    workDir: string,
  ): Promise<void> {
    const outputPath = join(workDir, 'text-layer.pdf');

    try {
      await this.textLayer.apply(sourcePath, outputPath, preset);
      const bytes = readFileSync(outputPath);
      assertPdfBytes(bytes, outputPath);

      await this.deps.storage.save(document.sourceKey, bytes);
      writeFileSync(sourcePath, bytes);
      this.deps.documents.update(document.id, {
        metadata: {
          ...document.metadata,
          textLayerApplied: true,
          textLayerPreset: preset.name,
        },
      });
      this.logger.info(
        `[DocumentProcessor] Applied text layer to ${document.id} with preset ${preset.name}`,
      );
    } catch (error) {
      this.logger.warn(
        `[DocumentProcessor] Text layer for ${document.id} failed, keeping the original PDF: ${errorMessage(error)}`,
      );
    }
  }

  /**
   * @returns whether the page was queued for processing
   */
  private async storePage(
    document: Document,
    splitPage: SplitPage,
  ): Promise<boolean> {
    const { page } = this.deps.pages.getOrCreate(
      document.id,
      splitPage.pageNumber,
    );
    if (page.status === 'completed') {
      return false;
    }

    const key = pagePdfKey(document, splitPage.pageNumber);
    const bytes = readFileSync(splitPage.path);
    assertPdfBytes(bytes, key);

    await this.deps.storage.save(key, bytes);
    this.deps.pages.update(page.id, { pdfKey: key });
    this.deps.jobs.enqueue('process-page', { pageId: page.id });
    return true;
  }

  private failPage(
    document: Document,
    pageNumber: number,
    reason: unknown,
  ): void {
    const message = errorMessage(reason);
    this.logger.warn(
      `[DocumentProcessor] Page ${pageNumber} of ${document.id} not stored: ${message}`,
    );
    const { page } = this.deps.pages.getOrCreate(document.id, pageNumber);
    this.deps.pages.update(page.id, {
      status: 'failed',
      metadata: { ...page.metadata, error: message },
    });
  }

  private failDocument(documentId: string, message: string): void {
    const current = this.deps.documents.getById(documentId);
    this.deps.documents.update(documentId, {
      status: 'failed',
      metadata: { ...current.metadata, error: message },
    });
  }
}
