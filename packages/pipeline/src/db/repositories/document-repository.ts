import type {
  Document,
  Metadata,
  OcrBackendKind,
  ProcessingStatus,
} from '@pagemill/model';

import type { JsonDatabase } from '../database';
import type { DocumentRecord } from '../records';

import { DocumentNotFoundError } from '../../errors/pipeline-errors';
import { createId, now } from '../../utils/id';

function recordToDocument(row: DocumentRecord): Document {
  return {
    id: row.id,
    title: row.title,
    collection: row.collection,
    sourceKey: row.source_key,
    thumbnailKey: row.thumbnail_key,
    pageCount: row.page_count,
    processedPages: row.processed_pages,
    status: row.status,
    backend: row.backend,
    ocrModel: row.ocr_model,
    ocrPresetId: row.ocr_preset_id,
    doclingPresetId: row.docling_preset_id,
    metadata: JSON.parse(row.metadata_json),
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export interface CreateDocumentInput {
  /** Preallocated id, so storage keys can be built before the record exists */
  id?: string;
  title: string;
  collection: string;
  sourceKey: string;
  backend?: OcrBackendKind | null;
  ocrModel?: string | null;
  ocrPresetId?: string | null;
  doclingPresetId?: string | null;
  metadata?: Metadata;
}

export type DocumentPatch = Partial<{
  status: ProcessingStatus;
  processedPages: number;
  sourceKey: string;
  thumbnailKey: string | null;
  backend: OcrBackendKind | null;
  ocrModel: string | null;
  ocrPresetId: string | null;
  doclingPresetId: string | null;
  metadata: Metadata;
}>;

export class DocumentRepository {
  constructor(private readonly db: JsonDatabase) {}

  create(input: CreateDocumentInput): Document {
    const timestamp = now();
    const record: DocumentRecord = {
      id: input.id ?? createId('doc'),
      title: input.title,
      collection: input.collection,
      source_key: input.sourceKey,
      thumbnail_key: null,
      page_count: 0,
      processed_pages: 0,
      status: 'pending',
      backend: input.backend ?? null,
      ocr_model: input.ocrModel ?? null,
      ocr_preset_id: input.ocrPresetId ?? null,
      docling_preset_id: input.doclingPresetId ?? null,
      metadata_json: JSON.stringify(input.metadata ?? {}),
      created_at: timestamp,
      updated_at: timestamp,
    };

    this.db.transaction((state) => {
      state.documents.push(record);
    });

    return recordToDocument(record);
  }

  findById(id: string): Document | null {
    const record = this.db.read((state) =>
      state.documents.find((d) => d.id === id),
    );
    return record ? recordToDocument(record) : null;
  }

  /**
   * @throws DocumentNotFoundError
   */
  getById(id: string): Document {
    const document = this.findById(id);
    if (!document) {
      throw new DocumentNotFoundError(id);
    }
    return document;
  }

  list(): Document[] {
    return this.db.read((state) =>
      [...state.documents]
        .sort((a, b) => b.created_at.localeCompare(a.created_at))
        .map(recordToDocument),
    );
  }

  /**
   * @throws DocumentNotFoundError
   */
  update(id: string, patch: DocumentPatch): Document {
    return this.db.transaction((state) => {
      const record = state.documents.find((d) => d.id === id);
      if (!record) {
        throw new DocumentNotFoundError(id);
      }

      if (patch.status !== undefined) record.status = patch.status;
      if (patch.processedPages !== undefined)
        record.processed_pages = patch.processedPages;
      if (patch.sourceKey !== undefined) record.source_key = patch.sourceKey;
      if (patch.thumbnailKey !== undefined)
        record.thumbnail_key = patch.thumbnailKey;
      if (patch.backend !== undefined) record.backend = patch.backend;
      if (patch.ocrModel !== undefined) record.ocr_model = patch.ocrModel;
      if (patch.ocrPresetId !== undefined)
        record.ocr_preset_id = patch.ocrPresetId;
      if (patch.doclingPresetId !== undefined)
        record.docling_preset_id = patch.doclingPresetId;
      if (patch.metadata !== undefined)
        record.metadata_json = JSON.stringify(patch.metadata);
      record.updated_at = now();

      return recordToDocument(record);
    });
  }

  /**
   * Record the page count unless one is already stored.
   *
   * @returns whether the count was written
   */
  setPageCountIfUnset(id: string, pageCount: number): boolean {
    return this.db.transaction((state) => {
      const record = state.documents.find((d) => d.id === id);
      if (!record) {
        throw new DocumentNotFoundError(id);
      }
      if (record.page_count !== 0) {
        return false;
      }
      record.page_count = pageCount;
      record.updated_at = now();
      return true;
    });
  }
}
