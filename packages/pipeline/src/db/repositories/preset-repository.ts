import type { DoclingPreset, OcrPreset } from '@pagemill/model';

import type { JsonDatabase } from '../database';
import type {
  DatabaseState,
  DoclingPresetRecord,
  OcrPresetRecord,
} from '../records';

import type { IdPrefix } from '../../utils/id';

import { createId, now } from '../../utils/id';

export interface PresetShape {
  id: string;
  name: string;
  isDefault: boolean;
  createdAt: string;
  updatedAt: string;
}

export interface PresetRow {
  id: string;
  is_default: boolean;
  created_at: string;
}

export type PresetFields<P extends PresetShape> = Omit<
  P,
  'id' | 'createdAt' | 'updatedAt'
>;

export interface RowMeta {
  id: string;
  createdAt: string;
  updatedAt: string;
}

export interface PresetTable<P extends PresetShape, R extends PresetRow> {
  idPrefix: IdPrefix;
  rows(state: DatabaseState): R[];
  toRecord(fields: PresetFields<P>, meta: RowMeta): R;
  fromRecord(row: R): P;
}

/**
 * Storage for one preset table. At most one row is flagged default;
 * flag changes happen inside a single transaction.
 */
export class PresetRepository<P extends PresetShape, R extends PresetRow> {
  constructor(
    private readonly db: JsonDatabase,
    private readonly table: PresetTable<P, R>,
  ) {}

  list(): P[] {
    return this.db.read((state) =>
      this.table.rows(state).map((row) => this.table.fromRecord(row)),
    );
  }

  findById(id: string): P | null {
    const row = this.db.read((state) =>
      this.table.rows(state).find((r) => r.id === id),
    );
    return row ? this.table.fromRecord(row) : null;
  }

  findDefault(): P | null {
    const row = this.db.read((state) =>
      this.table.rows(state).find((r) => r.is_default),
    );
    return row ? this.table.fromRecord(row) : null;
  }

  /**
   * Insert a preset. A default preset clears the flag on every other row.
   */
  insert(fields: PresetFields<P>): P {
    return this.db.transaction((state) => {
      const rows = this.table.rows(state);
      const timestamp = now();
      const record = this.table.toRecord(fields, {
        id: createId(this.table.idPrefix),
        createdAt: timestamp,
        updatedAt: timestamp,
      });

      if (record.is_default) {
        rows.forEach((row) => {
          row.is_default = false;
        });
      }
      rows.push(record);
      return this.table.fromRecord(record);
    });
  }

  /**
   * Replace the stored fields of a preset.
   *
   * @returns the updated preset, or `null` when the id is unknown
   */
  replace(id: string, fields: PresetFields<P>): P | null {
    return this.db.transaction((state) => {
      const rows = this.table.rows(state);
      const index = rows.findIndex((r) => r.id === id);
      if (index === -1) {
        return null;
      }

      const record = this.table.toRecord(fields, {
        id,
        createdAt: rows[index].created_at,
        updatedAt: now(),
      });
      if (record.is_default) {
        rows.forEach((row) => {
          row.is_default = false;
        });
      }
      rows[index] = record;
      return this.table.fromRecord(record);
    });
  }

  delete(id: string): boolean {
    return this.db.transaction((state) => {
      const rows = this.table.rows(state);
      const index = rows.findIndex((r) => r.id === id);
      if (index === -1) {
        return false;
      }
      rows.splice(index, 1);
      return true;
    });
  }

  /**
   * Flag `id` as the default and clear the flag everywhere else.
   *
   * @returns the new default, or `null` when the id is unknown
   */
  setDefault(id: string): P | null {
    return this.db.transaction((state) => {
      const rows = this.table.rows(state);
      const target = rows.find((r) => r.id === id);
      if (!target) {
        return null;
      }
      rows.forEach((row) => {
        row.is_default = row.id === id;
      });
      return this.table.fromRecord(target);
    });
  }
}

export const OCR_PRESET_TABLE: PresetTable<OcrPreset, OcrPresetRecord> = {
  idPrefix: 'ocrp',
  rows: (state) => state.ocr_presets,
  toRecord: (fields, meta) => ({
    id: meta.id,
    name: fields.name,
    description: fields.description,
    is_default: fields.isDefault,
    force_ocr: fields.forceOcr,
    skip_text: fields.skipText,
    redo_ocr: fields.redoOcr,
    ocr_engine: fields.ocrEngine,
    language: fields.language,
    optimize: fields.optimize,
    jpeg_quality: fields.jpegQuality,
    png_quality: fields.pngQuality,
    deskew: fields.deskew,
    clean: fields.clean,
    clean_final: fields.cleanFinal,
    remove_background: fields.removeBackground,
    oversample: fields.oversample,
    rotate_pages: fields.rotatePages,
    remove_vectors: fields.removeVectors,
    advanced_settings_json: JSON.stringify(fields.advancedSettings),
    created_at: meta.createdAt,
    updated_at: meta.updatedAt,
  }),
  fromRecord: (row) => ({
    id: row.id,
    name: row.name,
    description: row.description,
    isDefault: row.is_default,
    forceOcr: row.force_ocr,
    skipText: row.skip_text,
    redoOcr: row.redo_ocr,
    ocrEngine: row.ocr_engine,
    language: row.language,
    optimize: row.optimize,
    jpegQuality: row.jpeg_quality,
    pngQuality: row.png_quality,
    deskew: row.deskew,
    clean: row.clean,
    cleanFinal: row.clean_final,
    removeBackground: row.remove_background,
    oversample: row.oversample,
    rotatePages: row.rotate_pages,
    removeVectors: row.remove_vectors,
    advancedSettings: JSON.parse(row.advanced_settings_json),
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  }),
};

export const DOCLING_PRESET_TABLE: PresetTable<
  DoclingPreset,
  DoclingPresetRecord
> = {
  idPrefix: 'dlp',
  rows: (state) => state.docling_presets,
  toRecord: (fields, meta) => ({
    id: meta.id,
    name: fields.name,
    description: fields.description,
    is_default: fields.isDefault,
    pipeline: fields.pipeline,
    ocr_engine: fields.ocrEngine,
    force_ocr: fields.forceOcr,
    ocr_languages_json: JSON.stringify(fields.ocrLanguages),
    vlm_model: fields.vlmModel,
    enable_picture_description: fields.enablePictureDescription,
    picture_description_prompt: fields.pictureDescriptionPrompt,
    enable_table_structure: fields.enableTableStructure,
    table_mode: fields.tableMode,
    enable_code_enrichment: fields.enableCodeEnrichment,
    enable_formula_enrichment: fields.enableFormulaEnrichment,
    filter_orphan_clusters: fields.filterOrphanClusters,
    filter_empty_clusters: fields.filterEmptyClusters,
    advanced_settings_json: JSON.stringify(fields.advancedSettings),
    created_at: meta.createdAt,
    updated_at: meta.updatedAt,
  }),
  fromRecord: (row) => ({
    id: row.id,
    name: row.name,
    description: row.description,
    isDefault: row.is_default,
    pipeline: row.pipeline,
    ocrEngine: row.ocr_engine,
    forceOcr: row.force_ocr,
    ocrLanguages: JSON.parse(row.ocr_languages_json),
    vlmModel: row.vlm_model,
    enablePictureDescription: row.enable_picture_description,
    pictureDescriptionPrompt: row.picture_description_prompt,
    enableTableStructure: row.enable_table_structure,
    tableMode: row.table_mode,
    enableCodeEnrichment: row.enable_code_enrichment,
    enableFormulaEnrichment: row.enable_formula_enrichment,
    filterOrphanClusters: row.filter_orphan_clusters,
    filterEmptyClusters: row.filter_empty_clusters,
    advancedSettings: JSON.parse(row.advanced_settings_json),
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  }),
};

export type OcrPresetRepository = PresetRepository<OcrPreset, OcrPresetRecord>;
export type DoclingPresetRepository = PresetRepository<
  DoclingPreset,
  DoclingPresetRecord
>;
