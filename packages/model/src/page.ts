import type { Metadata } from './document';
import type { ProcessingStatus } from './processing-status';
import type { Reference } from './reference';

/**
 * One page of a document. `(documentId, pageNumber)` is unique.
 */
export interface Page {
  id: string;
  documentId: string;
  /** 1-based */
  pageNumber: number;
  /** Storage key of the single-page PDF; `null` until split succeeds */
  pdfKey: string | null;
  rawText: string;
  markdown: string;
  /** Backend-specific layout payload */
  structuredJson: unknown;
  references: Reference[];
  /** Storage key of the debug overlay image */
  overlayKey: string | null;
  status: ProcessingStatus;
  metadata: Metadata;
  createdAt: string;
  updatedAt: string;
}

/**
 * Raster region saved for a page.
 */
export interface ExtractedImage {
  id: string;
  pageId: string;
  /** Storage key of the image bytes */
  fileKey: string;
  width: number;
  height: number;
  altText: string | null;
  /** Holds `regionIndex`, the ordinal of the originating image region */
  metadata: Metadata;
  createdAt: string;
}
