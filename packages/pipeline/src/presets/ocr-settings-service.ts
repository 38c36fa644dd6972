import type { OcrSettings } from '@pagemill/model';

import type { SettingsRepository } from '../db/repositories/settings-repository';

import { GROUNDING_OCR } from '@pagemill/ocr';

import { PresetValidationError } from '../errors/pipeline-errors';
import { toValidationIssues } from './preset-service';
import { ocrSettingsSchema } from './preset-schemas';

/**
 * Singleton grounding OCR settings. Stored on first read.
 */
export class OcrSettingsService {
  constructor(
    private readonly repository: SettingsRepository,
    private readonly defaultModel: string = GROUNDING_OCR.DEFAULT_MODEL,
  ) {}

  get(): OcrSettings {
    return (
      this.repository.get() ??
      this.repository.upsert({
        model: this.defaultModel,
        prompt: GROUNDING_OCR.DEFAULT_PROMPT,
      })
    );
  }

  /**
   * @throws PresetValidationError
   */
  update(patch: unknown): OcrSettings {
    const result = ocrSettingsSchema.partial().safeParse(patch);
    if (!result.success) {
      throw new PresetValidationError(
        'Invalid OCR settings',
        toValidationIssues(result.error),
      );
    }
    const current = this.get();
    return this.repository.upsert({
      model: result.data.model ?? current.model,
      prompt: result.data.prompt ?? current.prompt,
    });
  }
}
