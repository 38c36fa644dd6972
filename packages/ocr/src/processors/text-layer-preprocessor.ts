import type { LoggerMethods } from '@pagemill/logger';
import type { OcrPreset } from '@pagemill/model';

import { spawnAsync } from '@pagemill/shared';

import { TEXT_LAYER } from '../config/constants';

/** Preset fields that shape the OCRmyPDF command line */
export type TextLayerOptions = Pick<
  OcrPreset,
  | 'name'
  | 'forceOcr'
  | 'skipText'
  | 'redoOcr'
  | 'language'
  | 'optimize'
  | 'jpegQuality'
  | 'pngQuality'
  | 'deskew'
  | 'clean'
  | 'cleanFinal'
  | 'removeBackground'
  | 'oversample'
  | 'rotatePages'
  | 'removeVectors'
  | 'advancedSettings'
>;

/** Advanced keys OCRmyPDF rejects or that the engine field already covers */
const IGNORED_ADVANCED_KEYS = new Set(['ocr_engine', 'ocr-engine']);

/** Options OCRmyPDF refuses to combine with `--redo-ocr` */
const REDO_INCOMPATIBLE_KEYS = new Set([
  'deskew',
  'clean_final',
  'clean-final',
  'remove_background',
  'remove-background',
]);

/**
 * Exit code OCRmyPDF uses when the output was written but PDF/A conversion
 * failed. The text layer is still usable.
 */
const PDFA_CONVERSION_FAILED_EXIT_CODE = 10;

function toFlag(key: string): string {
  return `--${key.replace(/_/g, '-')}`;
}

/**
 * Translate a preset into OCRmyPDF command line arguments
 * (without the input and output paths).
 */
export function buildOcrmypdfArgs(
  preset: TextLayerOptions,
  logger?: LoggerMethods,
): string[] {
  const args: string[] = [];

  if (preset.redoOcr) {
    args.push('--redo-ocr');
  } else if (preset.forceOcr) {
    args.push('--force-ocr');
  } else if (preset.skipText) {
    args.push('--skip-text');
  }

  const languages = preset.language
    .split('+')
    .map((lang) => lang.trim())
    .filter((lang) => lang.length > 0);
  if (languages.length > 0) {
    args.push('--language', languages.join('+'));
  }

  if (preset.optimize > 0) {
    args.push('--optimize', String(preset.optimize));
  }
  if (preset.jpegQuality && preset.jpegQuality !== TEXT_LAYER.DEFAULT_JPEG_QUALITY) {
    args.push('--jpeg-quality', String(preset.jpegQuality));
  }
  if (preset.pngQuality && preset.pngQuality !== TEXT_LAYER.DEFAULT_PNG_QUALITY) {
    args.push('--png-quality', String(preset.pngQuality));
  }

  if (!preset.redoOcr) {
    if (preset.deskew) args.push('--deskew');
    if (preset.rotatePages) args.push('--rotate-pages');
    if (preset.cleanFinal) args.push('--clean-final');
    if (preset.removeBackground) args.push('--remove-background');
  }
  if (preset.clean) args.push('--clean');
  if (preset.oversample > 0) {
    args.push('--oversample', String(preset.oversample));
  }
  if (preset.removeVectors) args.push('--remove-vectors');

  for (const [key, value] of Object.entries(preset.advancedSettings)) {
    if (IGNORED_ADVANCED_KEYS.has(key)) {
      continue;
    }
    if (preset.redoOcr && REDO_INCOMPATIBLE_KEYS.has(key)) {
      logger?.warn(
        `[TextLayerPreprocessor] Skipping advanced setting '${key}' because it conflicts with redo OCR`,
      );
      continue;
    }
    if (typeof value === 'boolean') {
      if (value) args.push(toFlag(key));
      continue;
    }
    args.push(toFlag(key), String(value));
  }

  return args;
}

/**
 * Adds a searchable text layer to a PDF with OCRmyPDF.
 *
 * ## System Requirements
 * - `ocrmypdf` on PATH (with Tesseract and the requested language packs)
 */
export class TextLayerPreprocessor {
  constructor(private readonly logger: LoggerMethods) {}

  async apply(
    inputPath: string,
    outputPath: string,
    preset: TextLayerOptions,
  ): Promise<void> {
    const args = buildOcrmypdfArgs(preset, this.logger);

    this.logger.info(
      `[TextLayerPreprocessor] Running OCRmyPDF with preset ${preset.name}`,
    );
    this.logger.debug('[TextLayerPreprocessor] OCRmyPDF arguments:', args);

    const result = await spawnAsync(
      'ocrmypdf',
      [...args, inputPath, outputPath],
      { timeoutMs: TEXT_LAYER.TIMEOUT_MS },
    );

    if (result.code === PDFA_CONVERSION_FAILED_EXIT_CODE) {
      this.logger.warn(
        `[TextLayerPreprocessor] OCRmyPDF finished with exit code ${result.code}, keeping output`,
      );
      return;
    }

    if (result.code !== 0) {
      throw new Error(
        `[TextLayerPreprocessor] Failed to apply text layer: ${result.stderr || 'Unknown error'}`,
      );
    }
  }
}
