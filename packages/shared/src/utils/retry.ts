import type { LoggerMethods } from '@pagemill/logger';

/**
 * Exponential backoff with jitter.
 *
 * Delay doubles per attempt (1s, 2s, 4s, ...) up to `maxDelayMs`, then
 * +/- `jitterFraction` of randomness is applied.
 */
export interface BackoffConfig {
  /** Base delay in milliseconds (default: 1000) */
  baseDelayMs: number;
  /** Maximum delay in milliseconds (default: 30000) */
  maxDelayMs: number;
  /** Maximum number of attempts, including the first (default: 3) */
  maxAttempts: number;
  /** Jitter fraction +/- (default: 0.25) */
  jitterFraction: number;
}

export const DEFAULT_BACKOFF: BackoffConfig = {
  baseDelayMs: 1000,
  maxDelayMs: 30000,
  maxAttempts: 3,
  jitterFraction: 0.25,
};

/**
 * Delay for a zero-indexed attempt: `min(base * 2^attempt, max) +/- jitter`.
 * Never negative.
 */
export function calculateBackoffDelay(
  attempt: number,
  config?: Partial<BackoffConfig>,
): number {
  const cfg = { ...DEFAULT_BACKOFF, ...config };
  const cappedDelay = Math.min(
    cfg.baseDelayMs * Math.pow(2, attempt),
    cfg.maxDelayMs,
  );
  const jitter = (Math.random() * 2 - 1) * cappedDelay * cfg.jitterFraction;

  return Math.max(0, Math.round(cappedDelay + jitter));
}

export interface RetryOptions extends Partial<BackoffConfig> {
  /** Receives one debug line per wait */
  logger?: LoggerMethods;
  /** Label used in log lines, e.g. `document abc` */
  label?: string;
}

/**
 * Run `fn`, retrying errors accepted by `shouldRetry` with backoff.
 * Other errors are rethrown at once; after the last attempt the last
 * error is rethrown.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  shouldRetry: (error: unknown) => boolean,
  options: RetryOptions = {},
): Promise<T> {
  const { logger, label = 'operation', ...backoff } = options;
  const cfg = { ...DEFAULT_BACKOFF, ...backoff };
  let lastError: unknown;

  for (let attempt = 0; attempt < cfg.maxAttempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      lastError = error;
      if (!shouldRetry(error)) {
        throw error;
      }
      if (attempt < cfg.maxAttempts - 1) {
        const delay = calculateBackoffDelay(attempt, cfg);
        logger?.warn(
          `[withRetry] ${label} failed (attempt ${attempt + 1}/${cfg.maxAttempts}), retrying in ${delay}ms`,
        );
        await new Promise((resolve) => setTimeout(resolve, delay));
      }
    }
  }

  throw lastError;
}
