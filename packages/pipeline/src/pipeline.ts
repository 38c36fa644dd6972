import type { LoggerMethods } from '@pagemill/logger';
import type {
  Document,
  DocumentProgress,
  Metadata,
  OcrBackendKind,
  Page,
} from '@pagemill/model';

import type { PipelineConfig } from './config/env';
import type {
  DoclingPresetService,
  OcrPresetService,
} from './presets/preset-service';
import type { BackendFactory } from './processors/backend-resolver';
import type { ProcessDocumentOptions } from './processors/document-processor';
import type { ReprocessOptions } from './processors/page-processor';
import type { JobInfo, JobQueueEvents } from './queue/job-queue';
import type { SearchQuery, SearchResult } from './search/search-service';
import type { Storage } from './storage/storage';

import { createConsoleLogger } from '@pagemill/logger';
import { assertPdfBytes, createBackend, createOllamaModel } from '@pagemill/ocr';

import { loadConfig } from './config/env';
import { JsonDatabase } from './db/database';
import { DocumentRepository } from './db/repositories/document-repository';
import { ImageRepository } from './db/repositories/image-repository';
import { PageRepository } from './db/repositories/page-repository';
import {
  DOCLING_PRESET_TABLE,
  OCR_PRESET_TABLE,
  PresetRepository,
} from './db/repositories/preset-repository';
import { SettingsRepository } from './db/repositories/settings-repository';
import { OcrSettingsService } from './presets/ocr-settings-service';
import {
  DOCLING_PRESET_DEFINITION,
  OCR_PRESET_DEFINITION,
  PresetService,
} from './presets/preset-service';
import { BackendResolver } from './processors/backend-resolver';
import { DocumentProcessor } from './processors/document-processor';
import { ImageCaptioner } from './processors/image-captioner';
import { PageProcessor } from './processors/page-processor';
import { ProgressAggregator } from './processors/progress-aggregator';
import { JobQueue } from './queue/job-queue';
import { SearchService } from './search/search-service';
import { LocalStorage } from './storage/local-storage';
import { sourceKey } from './storage/storage-keys';
import { createId } from './utils/id';

export interface PipelineOptions {
  /** Defaults to {@link loadConfig} over `process.env` */
  config?: PipelineConfig;
  logger?: LoggerMethods;
  /** Defaults to the JSON file at `config.databasePath` */
  database?: JsonDatabase;
  /** Defaults to local storage under `config.storageRoot` */
  storage?: Storage;
  backendFactory?: BackendFactory;
}

export interface IngestInput {
  title: string;
  collection: string;
  /** Bytes of the uploaded PDF */
  pdf: Buffer;
  backend?: OcrBackendKind;
  ocrModel?: string;
  ocrPresetId?: string;
  doclingPresetId?: string;
  metadata?: Metadata;
  /** Add a text layer with the default OCRmyPDF preset before splitting */
  applyTextLayer?: boolean;
}

/**
 * Entry point of the ingestion pipeline.
 *
 * Owns the database, storage, job queue and processors. Everything that
 * runs a PDF tool or a model goes through the job queue; use
 * {@link Pipeline.onIdle} to wait for the queue to drain.
 *
 * @example
 * ```typescript
 * const pipeline = createPipeline();
 * const document = await pipeline.ingest({
 *   title: 'Field Notes, 1921',
 *   collection: 'archive',
 *   pdf: readFileSync('field-notes.pdf'),
 * });
 * await pipeline.onIdle();
 * console.log(pipeline.getProgress(document.id));
 * ```
 */
export class Pipeline {
  readonly logger: LoggerMethods;
  readonly ocrPresets: OcrPresetService;
  readonly doclingPresets: DoclingPresetService;
  readonly settings: OcrSettingsService;

  private readonly storage: Storage;
  private readonly documents: DocumentRepository;
  private readonly pages: PageRepository;
  private readonly images: ImageRepository;
  private readonly queue: JobQueue;
  private readonly aggregator: ProgressAggregator;
  private readonly documentProcessor: DocumentProcessor;
  private readonly pageProcessor: PageProcessor;
  private readonly searchService: SearchService;

  constructor(options: PipelineOptions = {}) {
    const config = options.config ?? loadConfig();
    this.logger =
      options.logger ?? createConsoleLogger({ level: config.logLevel });

    const db = options.database ?? new JsonDatabase(config.databasePath);
    this.storage = options.storage ?? new LocalStorage(config.storageRoot);
    this.documents = new DocumentRepository(db);
    this.pages = new PageRepository(db);
    this.images = new ImageRepository(db);

    this.ocrPresets = new PresetService(
      this.logger,
      new PresetRepository(db, OCR_PRESET_TABLE),
      OCR_PRESET_DEFINITION,
    );
    this.doclingPresets = new PresetService(
      this.logger,
      new PresetRepository(db, DOCLING_PRESET_TABLE),
      DOCLING_PRESET_DEFINITION,
    );
    this.settings = new OcrSettingsService(
      new SettingsRepository(db),
      config.ocrModel,
    );

    this.queue = new JobQueue(this.logger, {
      maxConcurrency: config.concurrency,
    });

    const resolver = new BackendResolver(
      this.logger,
      this.documents,
      this.ocrPresets,
      this.doclingPresets,
      this.settings,
      { ollamaBaseUrl: config.ollamaBaseUrl, doclingUrl: config.doclingUrl },
      options.backendFactory ?? createBackend,
    );

    this.aggregator = new ProgressAggregator(
      this.logger,
      this.documents,
      this.pages,
      { onSettled: (documentId) => resolver.invalidate(documentId) },
    );
    this.searchService = new SearchService(this.documents, this.pages);

    this.documentProcessor = new DocumentProcessor(this.logger, {
      documents: this.documents,
      pages: this.pages,
      storage: this.storage,
      ocrPresets: this.ocrPresets,
      aggregator: this.aggregator,
      jobs: this.queue,
    });
    this.pageProcessor = new PageProcessor(
      this.logger,
      {
        documents: this.documents,
        pages: this.pages,
        images: this.images,
        storage: this.storage,
        resolver,
        aggregator: this.aggregator,
      },
      {
        renderZoom: config.renderZoom,
        onImageSaved: config.captionImages
          ? (imageId) => this.queue.enqueue('caption-image', { imageId })
          : undefined,
      },
    );

    this.registerHandlers(config);
  }

  /**
   * Store an uploaded PDF, create its document and queue processing.
   *
   * @throws InvalidPdfError when the upload is not a PDF
   */
  async ingest(input: IngestInput): Promise<Document> {
    const id = createId('doc');
    const key = sourceKey({ id, ...input });
    assertPdfBytes(input.pdf, key);
    await this.storage.save(key, input.pdf);

    const document = this.documents.create({
      id,
      title: input.title,
      collection: input.collection,
      sourceKey: key,
      backend: input.backend,
      ocrModel: input.ocrModel,
      ocrPresetId: input.ocrPresetId,
      doclingPresetId: input.doclingPresetId,
      metadata: input.metadata,
    });
    this.logger.info(
      `[Pipeline] Ingested ${document.id} (${document.title}) at ${key}`,
    );

    this.processDocument(document.id, {
      applyTextLayer: input.applyTextLayer,
    });
    return document;
  }

  /** Queue a document run. A run already waiting is not queued twice. */
  processDocument(
    documentId: string,
    options: ProcessDocumentOptions = {},
  ): JobInfo {
    return this.queue.enqueue('process-document', {
      documentId,
      applyTextLayer: options.applyTextLayer,
    });
  }

  /**
   * Reset a page to `pending`, drop its previous results and queue it again.
   *
   * @throws PageNotFoundError
   */
  async reprocessPage(
    pageId: string,
    options: ReprocessOptions = {},
  ): Promise<Page> {
    const page = await this.pageProcessor.reset(pageId, options);
    this.queue.enqueue('process-page', { pageId });
    return page;
  }

  getDocument(documentId: string): Document | null {
    return this.documents.findById(documentId);
  }

  /** Newest first */
  listDocuments(): Document[] {
    return this.documents.list();
  }

  listPages(documentId: string): Page[] {
    return this.pages.listByDocument(documentId);
  }

  /**
   * @throws DocumentNotFoundError
   */
  getProgress(documentId: string): DocumentProgress {
    return this.aggregator.getProgress(documentId);
  }

  /**
   * @throws SearchQueryError
   */
  search(query: SearchQuery): SearchResult {
    return this.searchService.search(query);
  }

  on<E extends keyof JobQueueEvents>(
    event: E,
    listener: (...args: JobQueueEvents[E]) => void,
  ): () => void {
    return this.queue.on(event, listener);
  }

  /** Resolves once no job is queued or running */
  onIdle(): Promise<void> {
    return this.queue.onIdle();
  }

  private registerHandlers(config: PipelineConfig): void {
    this.queue.setHandler('process-document', ({ documentId, applyTextLayer }) =>
      this.documentProcessor.process(documentId, { applyTextLayer }),
    );
    this.queue.setHandler('generate-thumbnail', ({ documentId }) =>
      this.documentProcessor.generateThumbnail(documentId),
    );
    this.queue.setHandler('split-document', ({ documentId }) =>
      this.documentProcessor.split(documentId),
    );
    this.queue.setHandler('process-page', ({ pageId }) =>
      this.pageProcessor.process(pageId),
    );

    if (config.captionImages) {
      const captioner = new ImageCaptioner(
        this.logger,
        this.images,
        this.storage,
        {
          model: createOllamaModel(
            config.imageAltTextModel,
            config.ollamaBaseUrl,
          ),
        },
      );
      this.queue.setHandler('caption-image', async ({ imageId }) => {
        await captioner.caption(imageId);
      });
    }
  }
}

export function createPipeline(options: PipelineOptions = {}): Pipeline {
  return new Pipeline(options);
}
