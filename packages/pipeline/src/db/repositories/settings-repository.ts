import type { OcrSettings } from '@pagemill/model';

import type { JsonDatabase } from '../database';

import { now } from '../../utils/id';

export class SettingsRepository {
  constructor(private readonly db: JsonDatabase) {}

  get(): OcrSettings | null {
    const row = this.db.read((state) => state.ocr_settings);
    return row
      ? { model: row.model, prompt: row.prompt, updatedAt: row.updated_at }
      : null;
  }

  upsert(settings: Pick<OcrSettings, 'model' | 'prompt'>): OcrSettings {
    return this.db.transaction((state) => {
      const row = {
        model: settings.model,
        prompt: settings.prompt,
        updated_at: now(),
      };
      state.ocr_settings = row;
      return { model: row.model, prompt: row.prompt, updatedAt: row.updated_at };
    });
  }
}
