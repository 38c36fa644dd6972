import type { DoclingPreset, OcrPreset } from '@pagemill/model';

import type { PresetFields } from '../db/repositories/preset-repository';

import { doclingPresetSchema, ocrPresetSchema } from './preset-schemas';

/** Name of the preset created when a kind has no default */
export const BUILT_IN_PRESET_NAME = 'default';

/**
 * Keeps existing text layers and only OCRs pages without one.
 */
export const DEFAULT_OCR_PRESET: PresetFields<OcrPreset> = ocrPresetSchema.parse(
  {
    name: BUILT_IN_PRESET_NAME,
    description: 'Add a text layer to pages that have none',
    isDefault: true,
    skipText: true,
    ocrEngine: 'tesseract',
    language: 'eng',
    optimize: 1,
  },
);

export const DEFAULT_DOCLING_PRESET: PresetFields<DoclingPreset> =
  doclingPresetSchema.parse({
    name: BUILT_IN_PRESET_NAME,
    description: 'Standard pipeline with full-page OCR',
    isDefault: true,
    pipeline: 'standard',
    ocrEngine: 'auto',
    forceOcr: true,
    ocrLanguages: ['en'],
  });
