/**
 * Job queue defaults
 */
export const JOB_QUEUE = {
  /**
   * Jobs running at the same time
   */
  DEFAULT_CONCURRENCY: 4,
} as const;

/**
 * Document processing settings
 */
export const DOCUMENT_PROCESSOR = {
  /**
   * Concurrent page writes while splitting
   */
  SPLIT_CONCURRENCY: 8,

  /**
   * Lookups of a document that is not visible yet
   */
  LOOKUP_MAX_RETRIES: 3,
  LOOKUP_BASE_DELAY_MS: 1000,
  LOOKUP_MAX_DELAY_MS: 30000,
  LOOKUP_JITTER: 0.25,
} as const;

/**
 * Image captioning settings
 */
export const IMAGE_CAPTIONER = {
  DEFAULT_MODEL: 'qwen2-vl',
  PROMPT:
    'Describe this image concisely in 5-10 words suitable for a filename. Focus on the main subject.',
  MAX_RETRIES: 2,
} as const;

/**
 * Full-text search settings
 */
export const SEARCH = {
  /**
   * Pages scoring below this trigram similarity are dropped
   */
  DEFAULT_MIN_SCORE: 0.001,
  DEFAULT_LIMIT: 50,

  /**
   * Characters of page text shown around the first match
   */
  SNIPPET_LENGTH: 300,
} as const;

/** Storage key suffixes */
export const STORAGE_KEYS = {
  THUMBNAIL_SUFFIX: '-cover.jpg',
  OVERLAY_SUFFIX: '-bbox.png',
} as const;
