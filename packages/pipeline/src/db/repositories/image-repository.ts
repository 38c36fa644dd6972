import type { ExtractedImage, Metadata } from '@pagemill/model';

import type { JsonDatabase } from '../database';
import type { ImageRecord } from '../records';

import { createId, now } from '../../utils/id';

function recordToImage(row: ImageRecord): ExtractedImage {
  return {
    id: row.id,
    pageId: row.page_id,
    fileKey: row.file_key,
    width: row.width,
    height: row.height,
    altText: row.alt_text,
    metadata: JSON.parse(row.metadata_json),
    createdAt: row.created_at,
  };
}

export interface CreateImageInput {
  /** Pre-allocated id, so the file key can embed it */
  id?: string;
  pageId: string;
  fileKey: string;
  width: number;
  height: number;
  metadata?: Metadata;
}

export class ImageRepository {
  constructor(private readonly db: JsonDatabase) {}

  static newId(): string {
    return createId('img');
  }

  create(input: CreateImageInput): ExtractedImage {
    const record: ImageRecord = {
      id: input.id ?? ImageRepository.newId(),
      page_id: input.pageId,
      file_key: input.fileKey,
      width: input.width,
      height: input.height,
      alt_text: null,
      metadata_json: JSON.stringify(input.metadata ?? {}),
      created_at: now(),
    };

    this.db.transaction((state) => {
      state.images.push(record);
    });

    return recordToImage(record);
  }

  findById(id: string): ExtractedImage | null {
    const record = this.db.read((state) =>
      state.images.find((i) => i.id === id),
    );
    return record ? recordToImage(record) : null;
  }

  listByPage(pageId: string): ExtractedImage[] {
    return this.db.read((state) =>
      state.images.filter((i) => i.page_id === pageId).map(recordToImage),
    );
  }

  /**
   * @returns the updated image, or `null` when it no longer exists
   */
  setAltText(id: string, altText: string): ExtractedImage | null {
    return this.db.transaction((state) => {
      const record = state.images.find((i) => i.id === id);
      if (!record) {
        return null;
      }
      record.alt_text = altText;
      return recordToImage(record);
    });
  }

  /**
   * Remove every image of a page.
   *
   * @returns the removed images
   */
  deleteByPage(pageId: string): ExtractedImage[] {
    return this.db.transaction((state) => {
      const removed = state.images.filter((i) => i.page_id === pageId);
      state.images = state.images.filter((i) => i.page_id !== pageId);
      return removed.map(recordToImage);
    });
  }
}
