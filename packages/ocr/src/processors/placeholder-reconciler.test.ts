import { beforeEach, describe, expect, test, vi } from 'vitest';

import {
  PlaceholderReconciler,
  imageReferencePath,
} from './placeholder-reconciler';

const mockLogger = {
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
  debug: vi.fn(),
};

const MARKDOWN =
  'Hello\n\n![Image](__IMAGE_PLACEHOLDER_0__)\n\n## Chapter\n\n![Image](__IMAGE_PLACEHOLDER_1__)\n';

describe('PlaceholderReconciler', () => {
  let reconciler: PlaceholderReconciler;

  beforeEach(() => {
    vi.clearAllMocks();
    reconciler = new PlaceholderReconciler(mockLogger);
  });

  test('substitutes every placeholder when all regions were saved', () => {
    const result = reconciler.reconcile(MARKDOWN, ['/a/a.png', '/b/b.png']);

    expect(result).toEqual({
      markdown:
        'Hello\n\n![Image](/a/a.png)\n\n## Chapter\n\n![Image](/b/b.png)\n',
      substituted: [0, 1],
      orphaned: [],
    });
    expect(mockLogger.warn).not.toHaveBeenCalled();
  });

  test('removes the lines of placeholders beyond the reference list', () => {
    const result = reconciler.reconcile(MARKDOWN, ['/a/a.png']);

    expect(result.markdown).toBe(
      'Hello\n\n![Image](/a/a.png)\n\n## Chapter\n',
    );
    expect(result.orphaned).toEqual([1]);
    expect(result.markdown).not.toContain('__IMAGE_PLACEHOLDER_');
  });

  test('keeps later references aligned when an earlier region failed', () => {
    const result = reconciler.reconcile(MARKDOWN, [null, '/b/b.png']);

    expect(result.markdown).toBe('Hello\n\n## Chapter\n\n![Image](/b/b.png)\n');
    expect(result.substituted).toEqual([1]);
    expect(result.orphaned).toEqual([0]);
    expect(mockLogger.warn).toHaveBeenCalledWith(
      '[PlaceholderReconciler] Partial extraction: removed 1 image line(s) for regions 0',
    );
  });

  test('drops a leading orphan line without leaving blank lines', () => {
    const result = reconciler.reconcile(
      '![Image](__IMAGE_PLACEHOLDER_0__)\n\nText\n',
      [],
    );

    expect(result.markdown).toBe('Text\n');
  });

  test('leaves exactly as many image lines as references', () => {
    const markdown = [0, 1, 2, 3]
      .map((i) => `![Image](__IMAGE_PLACEHOLDER_${i}__)\n`)
      .join('\n');

    const result = reconciler.reconcile(markdown, ['/0/0.png', '/1/1.png']);

    expect(result.markdown).toBe('![Image](/0/0.png)\n\n![Image](/1/1.png)\n');
    expect(result.orphaned).toEqual([2, 3]);
  });

  test('inserts references literally', () => {
    const result = reconciler.reconcile('![Image](__IMAGE_PLACEHOLDER_0__)\n', [
      '/img_1/$&.png',
    ]);

    expect(result.markdown).toBe('![Image](/img_1/$&.png)\n');
  });

  test('does not confuse placeholder 1 with placeholder 10', () => {
    const markdown = Array.from(
      { length: 11 },
      (_, i) => `![Image](__IMAGE_PLACEHOLDER_${i}__)`,
    ).join('\n');
    const references = Array.from({ length: 11 }, (_, i) =>
      i === 1 ? null : `/r${i}`,
    );

    const result = reconciler.reconcile(markdown, references);

    expect(result.orphaned).toEqual([1]);
    expect(result.markdown).toContain('![Image](/r10)');
    expect(result.markdown.split('\n')).toHaveLength(10);
  });

  test('returns markdown without placeholders unchanged', () => {
    const result = reconciler.reconcile('Plain page\n', ['/a/a.png']);

    expect(result).toEqual({
      markdown: 'Plain page\n',
      substituted: [],
      orphaned: [],
    });
  });
});

describe('imageReferencePath', () => {
  test('uses the id when there is no alt text', () => {
    expect(
      imageReferencePath({
        id: 'img_1',
        fileKey: 'books/mill/1/images/image_0.png',
        altText: null,
      }),
    ).toBe('/img_1/img_1.png');
  });

  test('uses the alt text slug when present', () => {
    expect(
      imageReferencePath({
        id: 'img_1',
        fileKey: 'books/mill/1/images/image_0.png',
        altText: 'A red barn, at dusk!',
      }),
    ).toBe('/img_1/A-red-barn-at-dusk.png');
  });

  test('falls back to the id when the alt text has no usable characters', () => {
    expect(
      imageReferencePath({ id: 'img_2', fileKey: 'blob', altText: '!!!' }),
    ).toBe('/img_2/img_2.png');
  });
});
