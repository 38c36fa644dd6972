import type { OcrPreset } from '@pagemill/model';

import { beforeEach, describe, expect, test } from 'vitest';

import type { OcrPresetRepository, PresetFields } from './preset-repository';

import { JsonDatabase } from '../database';
import { OCR_PRESET_TABLE, PresetRepository } from './preset-repository';

function ocrFields(
  overrides: Partial<PresetFields<OcrPreset>> = {},
): PresetFields<OcrPreset> {
  return {
    name: 'scan',
    description: '',
    isDefault: false,
    forceOcr: false,
    skipText: true,
    redoOcr: false,
    ocrEngine: 'tesseract',
    language: 'eng',
    optimize: 1,
    jpegQuality: 75,
    pngQuality: 70,
    deskew: false,
    clean: false,
    cleanFinal: false,
    removeBackground: false,
    oversample: 0,
    rotatePages: false,
    removeVectors: false,
    advancedSettings: { tesseract_timeout: 60 },
    ...overrides,
  };
}

describe('PresetRepository', () => {
  let db: JsonDatabase;
  let repo: OcrPresetRepository;

  beforeEach(() => {
    db = JsonDatabase.inMemory();
    repo = new PresetRepository(db, OCR_PRESET_TABLE);
  });

  test('maps fields through the stored row', () => {
    const preset = repo.insert(ocrFields());

    expect(preset.id).toMatch(/^ocrp_/);
    expect(preset.advancedSettings).toEqual({ tesseract_timeout: 60 });
    expect(db.read((s) => s.ocr_presets[0].advanced_settings_json)).toBe(
      '{"tesseract_timeout":60}',
    );
    expect(repo.findById(preset.id)).toEqual(preset);
  });

  test('inserting a default clears the previous default', () => {
    const first = repo.insert(ocrFields({ name: 'a', isDefault: true }));
    const second = repo.insert(ocrFields({ name: 'b', isDefault: true }));

    expect(repo.findById(first.id)?.isDefault).toBe(false);
    expect(repo.findDefault()?.id).toBe(second.id);
  });

  test('setDefault leaves exactly one default', () => {
    const a = repo.insert(ocrFields({ name: 'a', isDefault: true }));
    const b = repo.insert(ocrFields({ name: 'b' }));

    expect(repo.setDefault(b.id)?.id).toBe(b.id);
    expect(repo.list().filter((p) => p.isDefault).map((p) => p.id)).toEqual([
      b.id,
    ]);
    expect(repo.findById(a.id)?.isDefault).toBe(false);
    expect(repo.setDefault('ocrp_missing')).toBeNull();
  });

  test('replace keeps id and creation time', () => {
    const preset = repo.insert(ocrFields());

    const replaced = repo.replace(preset.id, ocrFields({ language: 'deu' }));

    expect(replaced?.id).toBe(preset.id);
    expect(replaced?.createdAt).toBe(preset.createdAt);
    expect(replaced?.language).toBe('deu');
    expect(repo.replace('ocrp_missing', ocrFields())).toBeNull();
  });

  test('deletes presets', () => {
    const preset = repo.insert(ocrFields());

    expect(repo.delete(preset.id)).toBe(true);
    expect(repo.delete(preset.id)).toBe(false);
    expect(repo.list()).toEqual([]);
  });
});
