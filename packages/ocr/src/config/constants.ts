/**
 * Page rasterization settings
 */
export const PAGE_RENDERER = {
  /**
   * PDF user space resolution; zoom 1 renders at this DPI
   */
  BASE_DPI: 72,

  /**
   * Zoom used for OCR input and thumbnails
   */
  DEFAULT_ZOOM: 2,

  /**
   * JPEG quality for thumbnails (1-100)
   */
  THUMBNAIL_QUALITY: 85,
} as const;

/**
 * Region extraction settings
 */
export const REGION_EXTRACTOR = {
  /**
   * Grounding models emit boxes on a 0-1000 grid
   */
  NORMALIZED_GRID: 1000,

  /**
   * Overlay rectangle stroke width in pixels
   */
  OVERLAY_STROKE_WIDTH: 3,

  /**
   * Vertical offset of overlay labels above their box
   */
  OVERLAY_LABEL_OFFSET: 15,

  /**
   * Overlay colour per region type
   */
  OVERLAY_COLORS: {
    image: 'red',
    text: 'blue',
    sub_title: 'green',
    title: 'purple',
  },

  /**
   * Overlay colour for types not listed above
   */
  OVERLAY_DEFAULT_COLOR: 'yellow',
} as const;

/**
 * Grounding OCR defaults
 */
export const GROUNDING_OCR = {
  DEFAULT_MODEL: 'deepseek-ocr',
  DEFAULT_PROMPT: '<|grounding|>Convert the document to markdown.',
  DEFAULT_BASE_URL: 'http://localhost:11434/v1',
  MAX_RETRIES: 2,
} as const;

/**
 * docling-serve conversion settings
 */
export const DOCLING_BACKEND = {
  /**
   * Interval for task polling in milliseconds
   */
  POLL_INTERVAL_MS: 1000,

  /**
   * Give up on a single page conversion after this long
   */
  DEFAULT_TIMEOUT_MS: 300000,

  /**
   * Scale of page and picture images embedded in the result
   */
  IMAGES_SCALE: 2,

  /**
   * Local vision model docling uses for picture descriptions
   */
  PICTURE_DESCRIPTION_MODEL: 'HuggingFaceTB/SmolVLM-256M-Instruct',
} as const;

/**
 * OCRmyPDF settings
 */
export const TEXT_LAYER = {
  /**
   * OCRmyPDF defaults; values equal to these are not passed on the command line
   */
  DEFAULT_JPEG_QUALITY: 75,
  DEFAULT_PNG_QUALITY: 70,

  /**
   * Upper bound for a single OCRmyPDF run
   */
  TIMEOUT_MS: 30 * 60 * 1000,
} as const;

/** Leading bytes of every PDF file */
export const PDF_SIGNATURE = '%PDF';
