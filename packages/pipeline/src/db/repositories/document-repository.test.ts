import { beforeEach, describe, expect, test } from 'vitest';

import { DocumentNotFoundError } from '../../errors/pipeline-errors';
import { JsonDatabase } from '../database';
import { DocumentRepository } from './document-repository';

describe('DocumentRepository', () => {
  let repo: DocumentRepository;

  beforeEach(() => {
    repo = new DocumentRepository(JsonDatabase.inMemory());
  });

  test('creates a pending document without pages', () => {
    const doc = repo.create({
      title: 'Field Notes',
      collection: 'archive',
      sourceKey: 'archive/Field_Notes/Field_Notes.pdf',
      metadata: { year: 1921 },
    });

    expect(doc.id).toMatch(/^doc_/);
    expect(doc.status).toBe('pending');
    expect(doc.pageCount).toBe(0);
    expect(doc.processedPages).toBe(0);
    expect(doc.thumbnailKey).toBeNull();
    expect(doc.backend).toBeNull();
    expect(doc.metadata).toEqual({ year: 1921 });
    expect(repo.findById(doc.id)).toEqual(doc);
  });

  test('returns null or throws for unknown ids', () => {
    expect(repo.findById('doc_missing')).toBeNull();
    expect(() => repo.getById('doc_missing')).toThrow(DocumentNotFoundError);
    expect(() => repo.update('doc_missing', { status: 'failed' })).toThrow(
      'Document doc_missing not found',
    );
  });

  test('applies only the patched fields', () => {
    const doc = repo.create({
      title: 'Ledger',
      collection: 'archive',
      sourceKey: 'k',
      ocrModel: 'deepseek-ocr',
    });

    const updated = repo.update(doc.id, {
      status: 'processing',
      thumbnailKey: 'archive/Ledger/Ledger-cover.jpg',
    });

    expect(updated.status).toBe('processing');
    expect(updated.thumbnailKey).toBe('archive/Ledger/Ledger-cover.jpg');
    expect(updated.ocrModel).toBe('deepseek-ocr');
    expect(updated.title).toBe('Ledger');
  });

  test('writes the page count only once', () => {
    const doc = repo.create({ title: 'A', collection: 'c', sourceKey: 'k' });

    expect(repo.setPageCountIfUnset(doc.id, 12)).toBe(true);
    expect(repo.setPageCountIfUnset(doc.id, 40)).toBe(false);
    expect(repo.getById(doc.id).pageCount).toBe(12);
  });

  test('lists documents', () => {
    repo.create({ title: 'A', collection: 'c', sourceKey: 'a' });
    repo.create({ title: 'B', collection: 'c', sourceKey: 'b' });

    expect(
      repo
        .list()
        .map((d) => d.title)
        .sort(),
    ).toEqual(['A', 'B']);
  });
});
