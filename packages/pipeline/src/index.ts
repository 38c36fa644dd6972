/**
 * @pagemill/pipeline
 *
 * Ingestion and OCR orchestration for scanned-book PDFs.
 *
 * ## Key Features
 *
 * - Document processing: page count, optional OCRmyPDF text layer, thumbnail, splitting
 * - Page processing with a pluggable OCR backend and image linking
 * - Progress aggregation recomputed from the page set
 * - OCRmyPDF and Docling presets with a single default per kind
 * - Trigram search over completed pages
 *
 * @packageDocumentation
 */

export { Pipeline, createPipeline } from './pipeline';
export type { IngestInput, PipelineOptions } from './pipeline';
export { DOCUMENT_PROCESSOR, IMAGE_CAPTIONER, JOB_QUEUE, SEARCH } from './config/constants';
export { envSchema, loadConfig } from './config/env';
export type { PipelineConfig } from './config/env';
export {
  ConfigurationError,
  DocumentNotFoundError,
  PageNotFoundError,
  PresetValidationError,
  SearchQueryError,
} from './errors/pipeline-errors';
export type { ValidationIssue } from './errors/pipeline-errors';
export { JsonDatabase } from './db/database';
export { DocumentRepository } from './db/repositories/document-repository';
export { ImageRepository } from './db/repositories/image-repository';
export { PageRepository } from './db/repositories/page-repository';
export {
  DOCLING_PRESET_TABLE,
  OCR_PRESET_TABLE,
  PresetRepository,
} from './db/repositories/preset-repository';
export { SettingsRepository } from './db/repositories/settings-repository';
export type { Storage } from './storage/storage';
export { StorageKeyNotFoundError } from './storage/storage';
export { LocalStorage } from './storage/local-storage';
export { MemoryStorage } from './storage/memory-storage';
export { JobQueue } from './queue/job-queue';
export type {
  JobHandler,
  JobInfo,
  JobKind,
  JobPayloads,
  JobQueueEvents,
} from './queue/job-queue';
export {
  DOCLING_PRESET_DEFINITION,
  OCR_PRESET_DEFINITION,
  PresetService,
} from './presets/preset-service';
export type {
  DoclingPresetService,
  OcrPresetService,
  PresetDefinition,
} from './presets/preset-service';
export { OcrSettingsService } from './presets/ocr-settings-service';
export {
  BUILT_IN_PRESET_NAME,
  DEFAULT_DOCLING_PRESET,
  DEFAULT_OCR_PRESET,
} from './presets/default-presets';
export {
  doclingPresetSchema,
  ocrPresetSchema,
  ocrSettingsSchema,
} from './presets/preset-schemas';
export { BackendResolver } from './processors/backend-resolver';
export type {
  BackendFactory,
  BackendResolverOptions,
} from './processors/backend-resolver';
export { DocumentProcessor } from './processors/document-processor';
export type {
  DocumentProcessorOptions,
  ProcessDocumentOptions,
} from './processors/document-processor';
export { ImageCaptioner } from './processors/image-captioner';
export type { ImageCaptionerOptions } from './processors/image-captioner';
export { PageProcessor } from './processors/page-processor';
export type {
  PageProcessorOptions,
  ReprocessOptions,
} from './processors/page-processor';
export { ProgressAggregator } from './processors/progress-aggregator';
export type { ProgressAggregatorOptions } from './processors/progress-aggregator';
export { SearchService, searchQuerySchema } from './search/search-service';
export type {
  SearchDocumentHit,
  SearchPageHit,
  SearchQuery,
  SearchResult,
} from './search/search-service';
export { createSnippet } from './search/snippet';
export { trigramSimilarity } from './search/trigram';
