import type {
  Metadata,
  Page,
  ProcessingStatus,
  Reference,
} from '@pagemill/model';

import type { JsonDatabase } from '../database';
import type { PageRecord } from '../records';

import { PageNotFoundError } from '../../errors/pipeline-errors';
import { createId, now } from '../../utils/id';

function recordToPage(row: PageRecord): Page {
  return {
    id: row.id,
    documentId: row.document_id,
    pageNumber: row.page_number,
    pdfKey: row.pdf_key,
    rawText: row.raw_text,
    markdown: row.markdown,
    structuredJson:
      row.structured_json === null ? null : JSON.parse(row.structured_json),
    references: JSON.parse(row.references_json),
    overlayKey: row.overlay_key,
    status: row.status,
    metadata: JSON.parse(row.metadata_json),
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export type PagePatch = Partial<{
  pdfKey: string | null;
  rawText: string;
  markdown: string;
  structuredJson: unknown;
  references: Reference[];
  overlayKey: string | null;
  status: ProcessingStatus;
  metadata: Metadata;
}>;

export class PageRepository {
  constructor(private readonly db: JsonDatabase) {}

  /**
   * Page `pageNumber` of a document, created as `pending` when absent.
   */
  getOrCreate(
    documentId: string,
    pageNumber: number,
  ): { page: Page; created: boolean } {
    return this.db.transaction((state) => {
      const existing = state.pages.find(
        (p) => p.document_id === documentId && p.page_number === pageNumber,
      );
      if (existing) {
        return { page: recordToPage(existing), created: false };
      }

      const timestamp = now();
      const record: PageRecord = {
        id: createId('page'),
        document_id: documentId,
        page_number: pageNumber,
        pdf_key: null,
        raw_text: '',
        markdown: '',
        structured_json: null,
        references_json: '[]',
        overlay_key: null,
        status: 'pending',
        metadata_json: '{}',
        created_at: timestamp,
        updated_at: timestamp,
      };
      state.pages.push(record);
      return { page: recordToPage(record), created: true };
    });
  }

  findById(id: string): Page | null {
    const record = this.db.read((state) => state.pages.find((p) => p.id === id));
    return record ? recordToPage(record) : null;
  }

  /**
   * @throws PageNotFoundError
   */
  getById(id: string): Page {
    const page = this.findById(id);
    if (!page) {
      throw new PageNotFoundError(id);
    }
    return page;
  }

  /** Pages of a document in page order */
  listByDocument(documentId: string): Page[] {
    return this.db.read((state) =>
      state.pages
        .filter((p) => p.document_id === documentId)
        .sort((a, b) => a.page_number - b.page_number)
        .map(recordToPage),
    );
  }

  /** Status of every page of a document, without decoding payloads */
  listStatuses(documentId: string): ProcessingStatus[] {
    return this.db.read((state) =>
      state.pages
        .filter((p) => p.document_id === documentId)
        .map((p) => p.status),
    );
  }

  listByStatus(status: ProcessingStatus): Page[] {
    return this.db.read((state) =>
      state.pages.filter((p) => p.status === status).map(recordToPage),
    );
  }

  /**
   * @throws PageNotFoundError
   */
  update(id: string, patch: PagePatch): Page {
    return this.db.transaction((state) => {
      const record = state.pages.find((p) => p.id === id);
      if (!record) {
        throw new PageNotFoundError(id);
      }

      if (patch.pdfKey !== undefined) record.pdf_key = patch.pdfKey;
      if (patch.rawText !== undefined) record.raw_text = patch.rawText;
      if (patch.markdown !== undefined) record.markdown = patch.markdown;
      if (patch.structuredJson !== undefined)
        record.structured_json =
          patch.structuredJson === null
            ? null
            : JSON.stringify(patch.structuredJson);
      if (patch.references !== undefined)
        record.references_json = JSON.stringify(patch.references);
      if (patch.overlayKey !== undefined) record.overlay_key = patch.overlayKey;
      if (patch.status !== undefined) record.status = patch.status;
      if (patch.metadata !== undefined)
        record.metadata_json = JSON.stringify(patch.metadata);
      record.updated_at = now();

      return recordToPage(record);
    });
  }
}
