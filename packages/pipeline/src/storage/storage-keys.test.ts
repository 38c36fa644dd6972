import { describe, expect, test } from 'vitest';

import {
  imageKey,
  overlayKey,
  pagePdfKey,
  sourceKey,
  thumbnailKey,
} from './storage-keys';

const doc = { id: 'doc_1', collection: 'archive', title: 'Field Notes, 1921' };

describe('storage keys', () => {
  test('lay documents out by collection, cleaned title and id', () => {
    expect(sourceKey(doc)).toBe('archive/Field-Notes-1921/doc_1/Field-Notes-1921.pdf');
    expect(pagePdfKey(doc, 4)).toBe('archive/Field-Notes-1921/doc_1/4/page-4.pdf');
    expect(imageKey(doc, 4, 'img_1.png')).toBe(
      'archive/Field-Notes-1921/doc_1/4/images/img_1.png',
    );
    expect(overlayKey(doc, 4)).toBe(
      'archive/Field-Notes-1921/doc_1/4/page-4-bbox.png',
    );
    expect(thumbnailKey(doc)).toBe(
      'archive/Field-Notes-1921/doc_1/Field-Notes-1921-cover.jpg',
    );
  });

  test('keep documents with the same title apart', () => {
    const other = { ...doc, id: 'doc_2' };

    expect(sourceKey(other)).toBe(
      'archive/Field-Notes-1921/doc_2/Field-Notes-1921.pdf',
    );
    expect(sourceKey(other)).not.toBe(sourceKey(doc));
  });
});
