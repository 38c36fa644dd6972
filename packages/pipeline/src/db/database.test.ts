import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, test } from 'vitest';

import { JsonDatabase } from './database';

const settings = {
  model: 'deepseek-ocr',
  prompt: '<|grounding|>Convert the document to markdown.',
  updated_at: '2026-01-01T00:00:00.000Z',
};

describe('JsonDatabase', () => {
  test('starts empty in memory', () => {
    const db = JsonDatabase.inMemory();

    expect(db.read((state) => state.documents)).toEqual([]);
    expect(db.read((state) => state.ocr_settings)).toBeNull();
  });

  test('commits a transaction', () => {
    const db = JsonDatabase.inMemory();

    const result = db.transaction((state) => {
      state.ocr_settings = settings;
      return 'done';
    });

    expect(result).toBe('done');
    expect(db.read((state) => state.ocr_settings)).toEqual(settings);
  });

  test('rolls back a transaction that throws', () => {
    const db = JsonDatabase.inMemory();
    db.transaction((state) => {
      state.ocr_settings = settings;
    });

    expect(() =>
      db.transaction((state) => {
        state.ocr_settings = null;
        throw new Error('abort');
      }),
    ).toThrow('abort');
    expect(db.read((state) => state.ocr_settings)).toEqual(settings);
  });

  describe('with a file', () => {
    let dir: string;

    beforeEach(() => {
      dir = mkdtempSync(join(tmpdir(), 'pagemill-db-'));
    });

    afterEach(() => {
      rmSync(dir, { recursive: true, force: true });
    });

    test('persists and reloads state', () => {
      const path = join(dir, 'nested', 'db.json');
      new JsonDatabase(path).transaction((state) => {
        state.ocr_settings = settings;
      });

      expect(existsSync(`${path}.tmp`)).toBe(false);
      expect(JSON.parse(readFileSync(path, 'utf-8')).ocr_settings).toEqual(
        settings,
      );
      expect(new JsonDatabase(path).read((state) => state.ocr_settings)).toEqual(
        settings,
      );
    });

    test('fills in tables missing from older files', () => {
      const path = join(dir, 'db.json');
      writeFileSync(path, JSON.stringify({ documents: [] }));

      const db = new JsonDatabase(path);

      expect(db.read((state) => state.docling_presets)).toEqual([]);
      expect(db.read((state) => state.ocr_settings)).toBeNull();
    });
  });
});
