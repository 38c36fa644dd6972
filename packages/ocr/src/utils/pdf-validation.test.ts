import { describe, expect, test } from 'vitest';

import { InvalidPdfError } from '../errors/pdf-errors';
import { assertPdfBytes, isPdfBytes } from './pdf-validation';

describe('isPdfBytes', () => {
  test('accepts bytes with the PDF signature', () => {
    expect(isPdfBytes(Buffer.from('%PDF-1.7\n%âãÏÓ'))).toBe(true);
  });

  test('rejects empty and foreign bytes', () => {
    expect(isPdfBytes(Buffer.alloc(0))).toBe(false);
    expect(isPdfBytes(Buffer.from('%PD'))).toBe(false);
    expect(isPdfBytes(Buffer.from('\x89PNG\r\n'))).toBe(false);
  });
});

describe('assertPdfBytes', () => {
  test('passes for a PDF', () => {
    expect(() => assertPdfBytes(Buffer.from('%PDF-1.4'), 'page 1')).not.toThrow();
  });

  test('reports empty input', () => {
    expect(() => assertPdfBytes(Buffer.alloc(0), 'page 2')).toThrow(
      new InvalidPdfError('page 2', 'empty'),
    );
  });

  test('reports a missing signature', () => {
    expect(() => assertPdfBytes(Buffer.from('<html>'), 'page 3')).toThrow(
      'PDF page 3 does not start with %PDF',
    );
  });
});
