/**
 * One region parsed from grounding OCR output.
 *
 * Transient: references live only for the duration of one page job and are
 * stored on the page as a JSON payload for inspection.
 */
export interface Reference {
  /** Region type tag, e.g. `text`, `image`, `sub_title`, `title`, `table` */
  type: string;

  /**
   * Box as emitted by the model, normally `[x1, y1, x2, y2]`.
   * May hold fewer than four values when the model output was malformed.
   */
  boundingBox: number[];

  /** Trimmed free text that followed the detection tag */
  content: string;
}

/** A region crop that was written to disk */
export interface ExtractedRegion {
  /** 0-based ordinal among image-typed references */
  regionIndex: number;
  /** Absolute path of the cropped file */
  path: string;
  byteSize: number;
  width: number;
  height: number;
}
