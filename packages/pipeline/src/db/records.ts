import type {
  DoclingPreset,
  OcrBackendKind,
  OcrPreset,
  ProcessingStatus,
} from '@pagemill/model';

/*
 * Stored row shapes. Column names are snake_case and nested values are kept
 * as JSON strings, so the file stays close to a relational layout.
 */

export interface DocumentRecord {
  id: string;
  title: string;
  collection: string;
  source_key: string;
  thumbnail_key: string | null;
  page_count: number;
  processed_pages: number;
  status: ProcessingStatus;
  backend: OcrBackendKind | null;
  ocr_model: string | null;
  ocr_preset_id: string | null;
  docling_preset_id: string | null;
  metadata_json: string;
  created_at: string;
  updated_at: string;
}

export interface PageRecord {
  id: string;
  document_id: string;
  page_number: number;
  pdf_key: string | null;
  raw_text: string;
  markdown: string;
  structured_json: string | null;
  references_json: string;
  overlay_key: string | null;
  status: ProcessingStatus;
  metadata_json: string;
  created_at: string;
  updated_at: string;
}

export interface ImageRecord {
  id: string;
  page_id: string;
  file_key: string;
  width: number;
  height: number;
  alt_text: string | null;
  metadata_json: string;
  created_at: string;
}

export interface OcrPresetRecord {
  id: string;
  name: string;
  description: string;
  is_default: boolean;
  force_ocr: boolean;
  skip_text: boolean;
  redo_ocr: boolean;
  ocr_engine: OcrPreset['ocrEngine'];
  language: string;
  optimize: OcrPreset['optimize'];
  jpeg_quality: number;
  png_quality: number;
  deskew: boolean;
  clean: boolean;
  clean_final: boolean;
  remove_background: boolean;
  oversample: number;
  rotate_pages: boolean;
  remove_vectors: boolean;
  advanced_settings_json: string;
  created_at: string;
  updated_at: string;
}

export interface DoclingPresetRecord {
  id: string;
  name: string;
  description: string;
  is_default: boolean;
  pipeline: DoclingPreset['pipeline'];
  ocr_engine: DoclingPreset['ocrEngine'];
  force_ocr: boolean;
  ocr_languages_json: string;
  vlm_model: string | null;
  enable_picture_description: boolean;
  picture_description_prompt: string;
  enable_table_structure: boolean;
  table_mode: DoclingPreset['tableMode'];
  enable_code_enrichment: boolean;
  enable_formula_enrichment: boolean;
  filter_orphan_clusters: boolean;
  filter_empty_clusters: boolean;
  advanced_settings_json: string;
  created_at: string;
  updated_at: string;
}

export interface OcrSettingsRecord {
  model: string;
  prompt: string;
  updated_at: string;
}

export interface DatabaseState {
  documents: DocumentRecord[];
  pages: PageRecord[];
  images: ImageRecord[];
  ocr_presets: OcrPresetRecord[];
  docling_presets: DoclingPresetRecord[];
  ocr_settings: OcrSettingsRecord | null;
}

export function emptyDatabaseState(): DatabaseState {
  return {
    documents: [],
    pages: [],
    images: [],
    ocr_presets: [],
    docling_presets: [],
    ocr_settings: null,
  };
}
