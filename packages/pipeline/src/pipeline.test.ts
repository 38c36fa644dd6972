import type { LoggerMethods } from '@pagemill/logger';
import type { OcrBackend, PageInput, PageResult } from '@pagemill/ocr';
import type { Mock } from 'vitest';

import { InvalidPdfError, PdfOpenError } from '@pagemill/ocr';
import { spawnAsync } from '@pagemill/shared';
import { writeFileSync } from 'node:fs';
import { beforeEach, describe, expect, test, vi } from 'vitest';

import type { BackendFactory } from './processors/backend-resolver';

import { loadConfig } from './config/env';
import { JsonDatabase } from './db/database';
import { type Pipeline, createPipeline } from './pipeline';
import { BackendResolver } from './processors/backend-resolver';
import { MemoryStorage } from './storage/memory-storage';

vi.mock('@pagemill/shared', async (importOriginal) => ({
  ...(await importOriginal<typeof import('@pagemill/shared')>()),
  spawnAsync: vi.fn(),
}));

const ok = { code: 0, stdout: '', stderr: '' };

function pdfBytes(label: string): Buffer {
  return Buffer.from(`%PDF-1.7\n%${label}`);
}

describe('Pipeline', () => {
  let mockLogger: LoggerMethods;
  let storage: MemoryStorage;
  let processPage: (input: PageInput) => Promise<PageResult>;
  let backendFactory: Mock<BackendFactory>;
  let pipeline: Pipeline;

  beforeEach(() => {
    mockLogger = {
      debug: vi.fn(),
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
    };
    storage = new MemoryStorage();

    vi.mocked(spawnAsync).mockImplementation(async (command, args) => {
      switch (command) {
        case 'pdfinfo':
          return { ...ok, stdout: 'Title: test\nPages:          2\n' };
        case 'pdfseparate':
          for (const n of [1, 2]) {
            writeFileSync(args[1].replace('%d', String(n)), pdfBytes(`page ${n}`));
          }
          return ok;
        case 'magick':
          writeFileSync(args[args.length - 1], 'raster');
          return ok;
        default:
          return { code: 1, stdout: '', stderr: `unexpected ${command}` };
      }
    });

    processPage = async (input) => ({
      rawText: `raw ${input.pageNumber}`,
      markdown: `# Page ${input.pageNumber}`,
      images: [],
    });
    backendFactory = vi.fn<BackendFactory>(
      (): OcrBackend => ({
        kind: 'grounding',
        process: (input) => processPage(input),
      }),
    );

    pipeline = createPipeline({
      config: loadConfig({ PAGEMILL_DATA_DIR: '/tmp/pagemill-test' }),
      logger: mockLogger,
      database: JsonDatabase.inMemory(),
      storage,
      backendFactory,
    });
  });

  test('takes an uploaded PDF through to completed pages', async () => {
    const document = await pipeline.ingest({
      title: 'Field Notes, 1921',
      collection: 'archive',
      pdf: pdfBytes('source'),
    });
    await pipeline.onIdle();

    expect(pipeline.getProgress(document.id)).toEqual({
      documentId: document.id,
      status: 'completed',
      processedPages: 2,
      pageCount: 2,
      percent: 100,
    });
    expect(pipeline.listPages(document.id).map((p) => p.markdown)).toEqual([
      '# Page 1',
      '# Page 2',
    ]);
    const prefix = `archive/Field-Notes-1921/${document.id}`;
    expect(document.sourceKey).toBe(`${prefix}/Field-Notes-1921.pdf`);
    expect(pipeline.getDocument(document.id)?.thumbnailKey).toBe(
      `${prefix}/Field-Notes-1921-cover.jpg`,
    );
    expect(storage.keys()).toEqual([
      `${prefix}/1/page-1.pdf`,
      `${prefix}/2/page-2.pdf`,
      `${prefix}/Field-Notes-1921-cover.jpg`,
      `${prefix}/Field-Notes-1921.pdf`,
    ]);
    expect(backendFactory).toHaveBeenCalledTimes(1);
  });

  test('drops the cached backend once the document completes', async () => {
    const invalidate = vi.spyOn(BackendResolver.prototype, 'invalidate');
    pipeline = createPipeline({
      config: loadConfig({ PAGEMILL_DATA_DIR: '/tmp/pagemill-test' }),
      logger: mockLogger,
      database: JsonDatabase.inMemory(),
      storage,
      backendFactory,
    });

    try {
      const document = await pipeline.ingest({
        title: 'Field Notes',
        collection: 'archive',
        pdf: pdfBytes('source'),
      });
      await pipeline.onIdle();

      expect(invalidate).toHaveBeenCalledTimes(1);
      expect(invalidate).toHaveBeenCalledWith(document.id);
    } finally {
      invalidate.mockRestore();
    }
  });

  test('makes finished pages searchable', async () => {
    const document = await pipeline.ingest({
      title: 'Field Notes',
      collection: 'archive',
      pdf: pdfBytes('source'),
    });
    await pipeline.onIdle();

    const result = pipeline.search({ query: 'page 2' });

    expect(result.totalResults).toBe(1);
    expect(result.documents[0]).toMatchObject({
      documentId: document.id,
      pages: [{ pageNumber: 2, snippet: '# Page 2' }],
    });
  });

  test('fails the document when pdfinfo cannot read it', async () => {
    vi.mocked(spawnAsync).mockResolvedValue({
      code: 1,
      stdout: '',
      stderr: 'Syntax Error: Couldn\'t find trailer dictionary\n',
    });
    const onFailed = vi.fn();
    pipeline.on('job:failed', onFailed);

    const document = await pipeline.ingest({
      title: 'Broken',
      collection: 'archive',
      pdf: pdfBytes('truncated'),
    });
    await pipeline.onIdle();

    expect(pipeline.getProgress(document.id)).toMatchObject({
      status: 'failed',
      pageCount: 0,
      percent: 0,
    });
    expect(pipeline.listPages(document.id)).toEqual([]);
    expect(onFailed).toHaveBeenCalledWith(
      expect.objectContaining({ kind: 'process-document' }),
      expect.any(PdfOpenError),
    );
  });

  test('rejects an upload that is not a PDF', async () => {
    await expect(
      pipeline.ingest({
        title: 'Notes',
        collection: 'archive',
        pdf: Buffer.from('PK\u0003\u0004'),
      }),
    ).rejects.toThrow(InvalidPdfError);
    expect(pipeline.listDocuments()).toEqual([]);
    expect(storage.keys()).toEqual([]);
  });

  test('keeps the files of documents that share a title apart', async () => {
    const first = await pipeline.ingest({
      title: 'Annual Report',
      collection: 'archive',
      pdf: pdfBytes('A'),
    });
    const second = await pipeline.ingest({
      title: 'Annual Report',
      collection: 'archive',
      pdf: pdfBytes('B'),
    });
    await pipeline.onIdle();

    expect(first.sourceKey).not.toBe(second.sourceKey);
    expect((await storage.open(first.sourceKey)).toString()).toBe(
      '%PDF-1.7\n%A',
    );
    expect((await storage.open(second.sourceKey)).toString()).toBe(
      '%PDF-1.7\n%B',
    );
    const pdfKeys = [first, second].flatMap((d) =>
      pipeline.listPages(d.id).map((p) => p.pdfKey),
    );
    expect(new Set(pdfKeys).size).toBe(4);
  });

  test('reprocesses a page with another model', async () => {
    const document = await pipeline.ingest({
      title: 'Field Notes',
      collection: 'archive',
      pdf: pdfBytes('source'),
    });
    await pipeline.onIdle();
    const [first] = pipeline.listPages(document.id);
    processPage = async (input) => ({
      rawText: 'second pass',
      markdown: `# Page ${input.pageNumber}, second pass`,
      images: [],
    });

    const reset = await pipeline.reprocessPage(first.id, {
      ocrModel: 'other-ocr',
    });
    expect(reset.status).toBe('pending');
    await pipeline.onIdle();

    expect(pipeline.listPages(document.id)[0]).toMatchObject({
      status: 'completed',
      markdown: '# Page 1, second pass',
    });
    expect(pipeline.getDocument(document.id)).toMatchObject({
      ocrModel: 'other-ocr',
      status: 'completed',
      processedPages: 2,
    });
    expect(backendFactory).toHaveBeenCalledTimes(2);
  });
});
