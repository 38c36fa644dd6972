/**
 * Settings bundle for the OCRmyPDF text-layer step.
 * Field defaults mirror the OCRmyPDF command line defaults.
 */
export interface OcrPreset {
  id: string;
  name: string;
  description: string;
  isDefault: boolean;
  forceOcr: boolean;
  skipText: boolean;
  redoOcr: boolean;
  ocrEngine: 'tesseract' | 'cuneiform' | 'easyocr';
  /** Tesseract language codes joined with `+`, e.g. `eng+deu` */
  language: string;
  /** 0 disables optimization, 3 is the most aggressive */
  optimize: 0 | 1 | 2 | 3;
  jpegQuality: number;
  pngQuality: number;
  deskew: boolean;
  clean: boolean;
  cleanFinal: boolean;
  removeBackground: boolean;
  /** Oversampling DPI, 0 disables */
  oversample: number;
  rotatePages: boolean;
  removeVectors: boolean;
  /** Extra command line options, keyed by OCRmyPDF option name */
  advancedSettings: Record<string, string | number | boolean>;
  createdAt: string;
  updatedAt: string;
}

/**
 * Settings bundle for docling-serve conversions.
 */
export interface DoclingPreset {
  id: string;
  name: string;
  description: string;
  isDefault: boolean;
  pipeline: 'standard' | 'vlm';
  ocrEngine: 'auto' | 'easyocr' | 'tesseract' | 'rapidocr' | 'ocrmac';
  forceOcr: boolean;
  ocrLanguages: string[];
  /** Model preset name used by the VLM pipeline */
  vlmModel: string | null;
  enablePictureDescription: boolean;
  pictureDescriptionPrompt: string;
  enableTableStructure: boolean;
  tableMode: 'fast' | 'accurate';
  enableCodeEnrichment: boolean;
  enableFormulaEnrichment: boolean;
  filterOrphanClusters: boolean;
  filterEmptyClusters: boolean;
  /** Merged verbatim into the docling conversion options */
  advancedSettings: Record<string, unknown>;
  createdAt: string;
  updatedAt: string;
}

export type PresetKind = 'ocr' | 'docling';

/** Singleton settings for grounding OCR */
export interface OcrSettings {
  model: string;
  prompt: string;
  updatedAt: string;
}
