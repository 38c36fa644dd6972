import { z } from 'zod';

/**
 * OCRmyPDF preset input. Defaults mirror the OCRmyPDF command line.
 */
export const ocrPresetSchema = z.object({
  name: z.string().trim().min(1, { message: 'Name is required' }),
  description: z.string().default(''),
  isDefault: z.boolean().default(false),
  forceOcr: z.boolean().default(false),
  skipText: z.boolean().default(false),
  redoOcr: z.boolean().default(false),
  ocrEngine: z.enum(['tesseract', 'cuneiform', 'easyocr']).default('tesseract'),
  language: z
    .string()
    .regex(/^[a-z_]+(\+[a-z_]+)*$/i, {
      message: 'Language must be codes joined with +',
    })
    .default('eng'),
  optimize: z
    .union([z.literal(0), z.literal(1), z.literal(2), z.literal(3)])
    .default(1),
  jpegQuality: z.number().int().min(1).max(100).default(75),
  pngQuality: z.number().int().min(1).max(100).default(70),
  deskew: z.boolean().default(false),
  clean: z.boolean().default(false),
  cleanFinal: z.boolean().default(false),
  removeBackground: z.boolean().default(false),
  oversample: z.number().int().nonnegative().default(0),
  rotatePages: z.boolean().default(false),
  removeVectors: z.boolean().default(false),
  advancedSettings: z
    .record(z.union([z.string(), z.number(), z.boolean()]))
    .default({}),
});

export type OcrPresetInput = z.input<typeof ocrPresetSchema>;

/**
 * docling-serve preset input.
 */
export const doclingPresetSchema = z.object({
  name: z.string().trim().min(1, { message: 'Name is required' }),
  description: z.string().default(''),
  isDefault: z.boolean().default(false),
  pipeline: z.enum(['standard', 'vlm']).default('standard'),
  ocrEngine: z
    .enum(['auto', 'easyocr', 'tesseract', 'rapidocr', 'ocrmac'])
    .default('auto'),
  forceOcr: z.boolean().default(false),
  ocrLanguages: z.array(z.string().min(1)).min(1).default(['en']),
  vlmModel: z.string().min(1).nullable().default(null),
  enablePictureDescription: z.boolean().default(false),
  pictureDescriptionPrompt: z
    .string()
    .default('Describe this image in a few sentences.'),
  enableTableStructure: z.boolean().default(true),
  tableMode: z.enum(['fast', 'accurate']).default('accurate'),
  enableCodeEnrichment: z.boolean().default(false),
  enableFormulaEnrichment: z.boolean().default(false),
  filterOrphanClusters: z.boolean().default(false),
  filterEmptyClusters: z.boolean().default(true),
  advancedSettings: z.record(z.unknown()).default({}),
});

export type DoclingPresetInput = z.input<typeof doclingPresetSchema>;

export const ocrSettingsSchema = z.object({
  model: z.string().trim().min(1, { message: 'Model is required' }),
  prompt: z.string().min(1, { message: 'Prompt is required' }),
});

export type OcrSettingsInput = z.input<typeof ocrSettingsSchema>;
