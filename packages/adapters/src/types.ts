import type { Logger } from '@leansmith/shared';

/**
 * Retry behaviour of the provider transport.
 *
 * @example
 * ```typescript
 * const retryOptions: RetryOptions = {
 *   maxAttempts: 3,       // first call plus two retries
 *   initialDelayMs: 1000, // 1s, then 2s
 *   maxDelayMs: 30000,
 * };
 * ```
 */
export interface RetryOptions {
  /** Total number of calls, the first one included. Default: 3 */
  maxAttempts?: number;
  /** Delay before the first retry. Default: 1000 */
  initialDelayMs?: number;
  /** Maximum delay cap in milliseconds. Default: 30000 */
  maxDelayMs?: number;
  /** Multiplier for exponential backoff. Default: 2 */
  backoffFactor?: number;
}

/**
 * Context passed to adapter methods for each request.
 */
export interface AdapterContext {
  /** Identifier of the current workflow run */
  runId: string;
  logger: Logger;
  /** Per-call timeout in milliseconds */
  timeoutMs?: number;
  retryOptions?: RetryOptions;
}
