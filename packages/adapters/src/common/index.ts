import { eventMeta, errorMessage } from '@leansmith/shared';
import type { AdapterContext, RetryOptions } from '../types';
import { ConfigError, ProviderError, RateLimitError, TimeoutError } from '../errors';

/**
 * Default retry options for provider requests.
 *
 * Every failure is retried except `ConfigError` (bad credentials or setup).
 * The delay before retry `n` (1-based) is
 *
 * ```
 * delay = min(maxDelayMs, initialDelayMs * backoffFactor ^ (n - 1))
 * finalDelay = max(0, delay +/- 10% jitter)
 * ```
 *
 * A `RateLimitError` with `retryAfter` waits that long instead, capped at
 * `maxDelayMs`.
 *
 * Attempts are reported through `ProviderRequestStarted` and
 * `ProviderRequestFinished` (with the number of retries made).
 */
const DEFAULT_OPTIONS: Required<RetryOptions> = {
  maxAttempts: 3,
  initialDelayMs: 1000,
  maxDelayMs: 30_000,
  backoffFactor: 2,
};

export function retryDelayMs(retry: number, options: Required<RetryOptions>): number {
  const delay = Math.min(
    options.maxDelayMs,
    options.initialDelayMs * Math.pow(options.backoffFactor, retry - 1),
  );
  const jitter = delay * 0.1 * (Math.random() * 2 - 1);
  return Math.max(0, delay + jitter);
}

/** Wait before retry `retry` after `error` failed the previous call. */
export function nextDelayMs(error: unknown, retry: number, options: Required<RetryOptions>): number {
  if (error instanceof RateLimitError && error.retryAfter !== undefined) {
    return Math.min(options.maxDelayMs, error.retryAfter * 1000);
  }
  return retryDelayMs(retry, options);
}

/**
 * Executes a provider request with bounded retries and a per-call timeout.
 * Once the attempts are spent it throws a `ProviderError` whose `cause` is the
 * last failure.
 *
 * ```typescript
 * const completion = await executeProviderRequest(
 *   ctx,
 *   'openai',
 *   'gpt-4o',
 *   (signal) => client.chat.completions.create({ ... }, { signal }),
 * );
 * ```
 */
export async function executeProviderRequest<T>(
  ctx: AdapterContext,
  provider: string,
  model: string,
  requestFn: (signal: AbortSignal) => Promise<T>,
  optionsOverride: RetryOptions = {},
): Promise<T> {
  const options: Required<RetryOptions> = {
    ...DEFAULT_OPTIONS,
    ...ctx.retryOptions,
    ...optionsOverride,
  };
  const maxAttempts = Math.max(1, Math.floor(options.maxAttempts));

  const startTime = Date.now();
  await ctx.logger.log({
    ...eventMeta(ctx.runId),
    type: 'ProviderRequestStarted',
    payload: { provider, model },
  });

  let attempt = 0;
  let lastError: unknown;

  while (attempt < maxAttempts) {
    attempt++;
    const abortController = new AbortController();

    let timeoutId: NodeJS.Timeout | undefined;
    if (ctx.timeoutMs) {
      const timeoutMs = ctx.timeoutMs;
      timeoutId = setTimeout(() => {
        abortController.abort(new TimeoutError(`Request timed out after ${timeoutMs}ms`));
      }, timeoutMs);
    }

    try {
      const result = await requestFn(abortController.signal);
      await ctx.logger.log({
        ...eventMeta(ctx.runId),
        type: 'ProviderRequestFinished',
        payload: {
          provider,
          durationMs: Date.now() - startTime,
          success: true,
          retries: attempt - 1,
        },
      });
      return result;
    } catch (error: unknown) {
      lastError = error;

      if (error instanceof ConfigError) {
        break;
      }
      if (attempt < maxAttempts) {
        await ctx.logger.warn(
          `${provider} request failed (attempt ${attempt}/${maxAttempts}): ${errorMessage(error)}`,
        );
        await sleep(nextDelayMs(error, attempt, options));
      }
    } finally {
      if (timeoutId) clearTimeout(timeoutId);
    }
  }

  await ctx.logger.log({
    ...eventMeta(ctx.runId),
    type: 'ProviderRequestFinished',
    payload: {
      provider,
      durationMs: Date.now() - startTime,
      success: false,
      error: errorMessage(lastError),
      retries: attempt - 1,
    },
  });

  if (lastError instanceof ConfigError) {
    throw lastError;
  }
  throw new ProviderError(
    `${provider} request failed after ${attempt} attempt(s): ${errorMessage(lastError)}`,
    { cause: lastError, details: { provider, model, attempts: attempt } },
  );
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
