import { beforeEach, describe, expect, test } from 'vitest';

import { JsonDatabase } from '../database';
import { PageRepository } from './page-repository';

describe('PageRepository', () => {
  let repo: PageRepository;

  beforeEach(() => {
    repo = new PageRepository(JsonDatabase.inMemory());
  });

  test('creates a page once per document and number', () => {
    const first = repo.getOrCreate('doc_1', 3);
    const second = repo.getOrCreate('doc_1', 3);

    expect(first.created).toBe(true);
    expect(second.created).toBe(false);
    expect(second.page.id).toBe(first.page.id);
    expect(first.page).toMatchObject({
      documentId: 'doc_1',
      pageNumber: 3,
      pdfKey: null,
      markdown: '',
      structuredJson: null,
      references: [],
      status: 'pending',
      metadata: {},
    });
  });

  test('lists pages of a document in page order', () => {
    repo.getOrCreate('doc_1', 2);
    repo.getOrCreate('doc_2', 1);
    repo.getOrCreate('doc_1', 1);

    expect(repo.listByDocument('doc_1').map((p) => p.pageNumber)).toEqual([
      1, 2,
    ]);
  });

  test('round-trips structured fields', () => {
    const { page } = repo.getOrCreate('doc_1', 1);

    const updated = repo.update(page.id, {
      status: 'completed',
      markdown: '# Title',
      structuredJson: { blocks: [1, 2] },
      references: [
        { type: 'image', boundingBox: [10, 20, 30, 40], content: '' },
      ],
    });

    expect(updated.structuredJson).toEqual({ blocks: [1, 2] });
    expect(updated.references).toEqual([
      { type: 'image', boundingBox: [10, 20, 30, 40], content: '' },
    ]);
    expect(repo.getById(page.id).markdown).toBe('# Title');
  });

  test('filters by status', () => {
    const a = repo.getOrCreate('doc_1', 1).page;
    repo.getOrCreate('doc_1', 2);
    repo.update(a.id, { status: 'failed' });

    expect(repo.listByStatus('failed').map((p) => p.id)).toEqual([a.id]);
    expect(repo.listStatuses('doc_1')).toEqual(['failed', 'pending']);
  });

  test('throws for an unknown page', () => {
    expect(() => repo.update('page_x', { status: 'failed' })).toThrow(
      'Page page_x not found',
    );
  });
});
