import { afterEach, describe, expect, test, vi } from 'vitest';

import { calculateBackoffDelay, withRetry } from './retry';

const mockLogger = {
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
  debug: vi.fn(),
};

class TransientError extends Error {}

describe('calculateBackoffDelay', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  test('doubles the delay per attempt without jitter', () => {
    vi.spyOn(Math, 'random').mockReturnValue(0.5);

    expect(calculateBackoffDelay(0)).toBe(1000);
    expect(calculateBackoffDelay(1)).toBe(2000);
    expect(calculateBackoffDelay(2)).toBe(4000);
  });

  test('caps the delay at maxDelayMs', () => {
    vi.spyOn(Math, 'random').mockReturnValue(0.5);

    expect(calculateBackoffDelay(10, { maxDelayMs: 5000 })).toBe(5000);
  });

  test('applies jitter within the configured fraction', () => {
    vi.spyOn(Math, 'random').mockReturnValue(1);

    expect(calculateBackoffDelay(0)).toBe(1250);
  });
});

describe('withRetry', () => {
  test('returns the first successful result', async () => {
    const fn = vi.fn(async () => 'ok');

    await expect(withRetry(fn, () => true, { baseDelayMs: 0 })).resolves.toBe(
      'ok',
    );
    expect(fn).toHaveBeenCalledTimes(1);
  });

  test('retries retryable errors and passes the attempt number', async () => {
    const fn = vi
      .fn<(attempt: number) => Promise<string>>()
      .mockRejectedValueOnce(new TransientError('not yet'))
      .mockResolvedValueOnce('found');

    const result = await withRetry(
      fn,
      (error) => error instanceof TransientError,
      { baseDelayMs: 0, logger: mockLogger, label: 'document doc_1' },
    );

    expect(result).toBe('found');
    expect(fn).toHaveBeenNthCalledWith(1, 0);
    expect(fn).toHaveBeenNthCalledWith(2, 1);
    expect(mockLogger.warn).toHaveBeenCalledTimes(1);
  });

  test('rethrows non-retryable errors immediately', async () => {
    const fn = vi.fn(async () => {
      throw new Error('fatal');
    });

    await expect(withRetry(fn, () => false, { baseDelayMs: 0 })).rejects.toThrow(
      'fatal',
    );
    expect(fn).toHaveBeenCalledTimes(1);
  });

  test('gives up after maxAttempts with the last error', async () => {
    const fn = vi.fn(async (attempt: number) => {
      throw new TransientError(`attempt ${attempt}`);
    });

    await expect(
      withRetry(fn, () => true, { baseDelayMs: 0, maxAttempts: 3 }),
    ).rejects.toThrow('attempt 2');
    expect(fn).toHaveBeenCalledTimes(3);
  });
});
