import type { ExtractedRegion, OcrBackendKind, Reference } from '@pagemill/model';

/**
 * One page handed to a backend. All paths live inside `workDir`, which the
 * caller owns and removes afterwards.
 */
export interface PageInput {
  /** 1-based */
  pageNumber: number;
  /** Single-page PDF */
  pdfPath: string;
  /** Rasterized page */
  imagePath: string;
  /** Scratch directory for backend output */
  workDir: string;
}

/**
 * What a backend produced for one page.
 *
 * `markdown` carries `__IMAGE_PLACEHOLDER_<regionIndex>__` tokens for every
 * entry of `images`, and for regions that failed to extract.
 */
export interface PageResult {
  rawText: string;
  markdown: string;
  structuredJson?: unknown;
  references?: Reference[];
  images: ExtractedRegion[];
  /** Debug rendering of the detected regions */
  overlayPath?: string;
}

export interface OcrBackend {
  readonly kind: OcrBackendKind;
  process(input: PageInput): Promise<PageResult>;
}
