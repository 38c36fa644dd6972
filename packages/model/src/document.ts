import type { ProcessingStatus } from './processing-status';

/** Which OCR strategy a document is processed with */
export type OcrBackendKind = 'grounding' | 'docling' | 'text-layer';

/** Arbitrary JSON-compatible metadata bag */
export type Metadata = Record<string, unknown>;

/**
 * A logical scanned book.
 *
 * `pageCount` starts at 0 and is written once, when the source PDF is first
 * opened successfully. `processedPages` never exceeds it.
 */
export interface Document {
  id: string;
  title: string;
  /** Name of the owning collection, used to build storage keys */
  collection: string;
  /** Storage key of the uploaded PDF */
  sourceKey: string;
  /** Storage key of the cover thumbnail, once generated */
  thumbnailKey: string | null;
  pageCount: number;
  processedPages: number;
  status: ProcessingStatus;
  /** Explicit backend choice; `null` falls back to grounding OCR */
  backend: OcrBackendKind | null;
  /** Vision model override for grounding OCR */
  ocrModel: string | null;
  /** OCRmyPDF preset applied as a whole-document text layer */
  ocrPresetId: string | null;
  /** Docling preset; selects the Docling backend when set */
  doclingPresetId: string | null;
  metadata: Metadata;
  createdAt: string;
  updatedAt: string;
}

/** Snapshot returned by progress queries */
export interface DocumentProgress {
  documentId: string;
  status: ProcessingStatus;
  processedPages: number;
  pageCount: number;
  /** 0-100, rounded to two decimals */
  percent: number;
}
