export {
  ConcurrentPool,
  type PoolOutcome,
} from './utils/concurrent-pool';
export {
  LLMCaller,
  type ExtendedTokenUsage,
  type LLMCallConfig,
  type LLMCallResult,
} from './utils/llm-caller';
export {
  DEFAULT_BACKOFF,
  calculateBackoffDelay,
  withRetry,
  type BackoffConfig,
  type RetryOptions,
} from './utils/retry';
export {
  SPAWN_TIMEOUT_EXIT_CODE,
  spawnAsync,
  type SpawnAsyncOptions,
  type SpawnResult,
} from './utils/spawn-utils';
