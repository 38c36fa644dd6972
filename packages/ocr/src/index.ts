export {
  DOCLING_BACKEND,
  GROUNDING_OCR,
  PAGE_RENDERER,
  REGION_EXTRACTOR,
  TEXT_LAYER,
} from './config/constants';
export { InvalidPdfError, PdfOpenError } from './errors/pdf-errors';
export {
  IMAGE_PLACEHOLDER_PATTERN,
  imagePlaceholder,
  placeholderUrlResolver,
} from './parsers/image-placeholder';
export {
  parseBoundingBox,
  parseReferences,
  type ImageUrlResolver,
  type ParsedReferences,
} from './parsers/reference-parser';
export { PageRenderer, type RenderPageOptions } from './processors/page-renderer';
export { PdfSplitter, type SplitPage } from './processors/pdf-splitter';
export { PdfTextExtractor } from './processors/pdf-text-extractor';
export {
  PlaceholderReconciler,
  imageReferencePath,
  type ReconcileResult,
} from './processors/placeholder-reconciler';
export {
  RegionImageExtractor,
  detectCoordinateScale,
  toPixelBox,
  type CoordinateScale,
  type ImageDimensions,
  type PixelBox,
} from './processors/region-image-extractor';
export {
  TextLayerPreprocessor,
  buildOcrmypdfArgs,
  type TextLayerOptions,
} from './processors/text-layer-preprocessor';
export { cleanFilename } from './utils/filename';
export { cleanMarkdownText } from './utils/markdown-cleaner';
export { assertPdfBytes, isPdfBytes } from './utils/pdf-validation';
export type { OcrBackend, PageInput, PageResult } from './backends/ocr-backend';
export { createBackend, type BackendConfig } from './backends/create-backend';
export {
  DoclingBackend,
  buildDoclingOptions,
  createDoclingClient,
  type DoclingBackendOptions,
  type DoclingConversionPreset,
} from './backends/docling-backend';
export {
  GroundingOcrBackend,
  createOllamaModel,
  type GroundingOcrOptions,
} from './backends/grounding-ocr-backend';
export { TextLayerBackend } from './backends/text-layer-backend';
