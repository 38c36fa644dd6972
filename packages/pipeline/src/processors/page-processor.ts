import type { LoggerMethods } from '@pagemill/logger';
import type { Document, ExtractedRegion, Page } from '@pagemill/model';

import type { DocumentRepository } from '../db/repositories/document-repository';
import type { ImageRepository } from '../db/repositories/image-repository';
import type { PageRepository } from '../db/repositories/page-repository';
import type { Storage } from '../storage/storage';
import type { BackendResolver } from './backend-resolver';
import type { ProgressAggregator } from './progress-aggregator';

import {
  PAGE_RENDERER,
  PageRenderer,
  PlaceholderReconciler,
  assertPdfBytes,
  imageReferencePath,
} from '@pagemill/ocr';
import { omit } from 'es-toolkit';
import { readFileSync, writeFileSync } from 'node:fs';
import { extname, join } from 'node:path';

import { imageKey, overlayKey } from '../storage/storage-keys';
import { withWorkDir } from '../utils/work-dir';

export interface PageProcessorOptions {
  /** Rasterization zoom, multiple of 72 DPI */
  renderZoom?: number;
  /** Called with the id of every stored image, e.g. to queue captioning */
  onImageSaved?: (imageId: string) => void;
}

export interface ReprocessOptions {
  /** Grounding model to use from now on for the whole document */
  ocrModel?: string;
}

export interface PageProcessorDeps {
  documents: DocumentRepository;
  pages: PageRepository;
  images: ImageRepository;
  storage: Storage;
  resolver: BackendResolver;
  aggregator: ProgressAggregator;
  renderer?: PageRenderer;
  reconciler?: PlaceholderReconciler;
}

/**
 * Runs one page through rasterization, OCR, image storage and placeholder
 * reconciliation.
 *
 * `pending → processing → completed | failed`. Errors never escape
 * {@link PageProcessor.process}; they mark the page failed instead.
 */
export class PageProcessor {
  private readonly renderer: PageRenderer;
  private readonly reconciler: PlaceholderReconciler;
  private readonly renderZoom: number;

  constructor(
    private readonly logger: LoggerMethods,
    private readonly deps: PageProcessorDeps,
    private readonly options: PageProcessorOptions = {},
  ) {
    this.renderer = deps.renderer ?? new PageRenderer(logger);
    this.reconciler = deps.reconciler ?? new PlaceholderReconciler(logger);
    this.renderZoom = options.renderZoom ?? PAGE_RENDERER.DEFAULT_ZOOM;
  }

  /**
   * @throws PageNotFoundError when the page does not exist
   */
  async process(pageId: string): Promise<void> {
    const page = this.deps.pages.update(pageId, { status: 'processing' });
    const startTime = Date.now();

    try {
      await withWorkDir('page', (workDir) => this.run(page, workDir));
      this.logger.info(
        `[PageProcessor] Page ${page.pageNumber} of ${page.documentId} completed in ${Date.now() - startTime}ms`,
      );
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(
        `[PageProcessor] Page ${page.pageNumber} of ${page.documentId} failed: ${message}`,
      );
      this.deps.pages.update(pageId, {
        status: 'failed',
        metadata: { ...page.metadata, error: message },
      });
    } finally {
      this.deps.aggregator.update(page.documentId);
    }
  }

  /**
   * Put a page back to `pending` and drop everything a previous run
   * produced. The caller queues the page again.
   */
  async reset(pageId: string, options: ReprocessOptions = {}): Promise<Page> {
    const page = this.deps.pages.getById(pageId);

    if (options.ocrModel !== undefined) {
      this.deps.documents.update(page.documentId, {
        ocrModel: options.ocrModel,
      });
    }

    const removed = this.deps.images.deleteByPage(page.id);
    const staleKeys = [
      ...removed.map((image) => image.fileKey),
      ...(page.overlayKey ? [page.overlayKey] : []),
    ];
    for (const key of staleKeys) {
      await this.deps.storage.delete(key);
    }

    const reset = this.deps.pages.update(page.id, {
      status: 'pending',
      rawText: '',
      markdown: '',
      structuredJson: null,
      references: [],
      overlayKey: null,
      metadata: omit(page.metadata, ['error']),
    });
    this.deps.resolver.invalidate(page.documentId);
    this.deps.aggregator.update(page.documentId);

    this.logger.info(
      `[PageProcessor] Reset page ${page.pageNumber} of ${page.documentId}, removed ${removed.length} images`,
    );
    return reset;
  }

  private async run(page: Page, workDir: string): Promise<void> {
    if (page.pdfKey === null) {
      throw new Error(`[PageProcessor] Page ${page.pageNumber} has no PDF`);
    }

    const bytes = await this.deps.storage.open(page.pdfKey);
    assertPdfBytes(bytes, page.pdfKey);

    const pdfPath = join(workDir, `page-${page.pageNumber}.pdf`);
    const imagePath = join(workDir, `page-${page.pageNumber}.png`);
    writeFileSync(pdfPath, bytes);
    await this.renderer.renderPage(pdfPath, imagePath, {
      zoom: this.renderZoom,
    });

    const backend = this.deps.resolver.resolve(page.documentId);
    const result = await backend.process({
      pageNumber: page.pageNumber,
      pdfPath,
      imagePath,
      workDir,
    });

    const document = this.deps.documents.getById(page.documentId);
    const references = await this.saveImages(document, page, result.images);
    const reconciled = this.reconciler.reconcile(result.markdown, references);

    const storedOverlayKey = result.overlayPath
      ? await this.saveOverlay(document, page, result.overlayPath)
      : null;

    this.deps.pages.update(page.id, {
      rawText: result.rawText,
      markdown: reconciled.markdown,
      structuredJson: result.structuredJson ?? null,
      references: result.references ?? [],
      overlayKey: storedOverlayKey,
      status: 'completed',
      metadata: omit(page.metadata, ['error']),
    });
  }

  /**
   * Store every extracted region.
   *
   * @returns entry `i` holds the reference of region `i`, or `null` when that
   * region was not stored
   */
  private async saveImages(
    document: Document,
    page: Page,
    regions: ExtractedRegion[],
  ): Promise<Array<string | null>> {
    const slots = Math.max(0, ...regions.map((r) => r.regionIndex + 1));
    const references: Array<string | null> = Array.from(
      { length: slots },
      () => null,
    );

    for (const region of regions) {
      try {
        const extension = extname(region.path) || '.png';
        const fileKey = imageKey(
          document,
          page.pageNumber,
          `image_${region.regionIndex}${extension}`,
        );
        await this.deps.storage.save(fileKey, readFileSync(region.path));

        const image = this.deps.images.create({
          pageId: page.id,
          fileKey,
          width: region.width,
          height: region.height,
          metadata: { regionIndex: region.regionIndex },
        });
        references[region.regionIndex] = imageReferencePath(image);
        this.options.onImageSaved?.(image.id);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        this.logger.warn(
          `[PageProcessor] Page ${page.pageNumber}: failed to store image region ${region.regionIndex}: ${message}`,
        );
      }
    }

    return references;
  }

  private async saveOverlay(
    document: Document,
    page: Page,
    overlayPath: string,
  ): Promise<string | null> {
    const key = overlayKey(document, page.pageNumber);
    try {
      await this.deps.storage.save(key, readFileSync(overlayPath));
      return key;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(
        `[PageProcessor] Page ${page.pageNumber}: failed to store overlay: ${message}`,
      );
      return null;
    }
  }
}
