import { ConfigError, RateLimitError, TimeoutError } from './errors';

/**
 * Shape of SDK errors that carry an HTTP status.
 */
export interface APIErrorLike {
  status?: number;
  message: string;
  headers?: Record<string, string | null | undefined>;
}

/** Seconds from a numeric `retry-after` header, if present and positive. */
export function retryAfterSeconds(error: APIErrorLike): number | undefined {
  const header = error.headers?.['retry-after'];
  if (!header) return undefined;
  const seconds = Number(header);
  return Number.isFinite(seconds) && seconds > 0 ? seconds : undefined;
}

/**
 * Error type checks supplied by each SDK-backed client.
 */
export interface ErrorTypeConfig {
  isAPIError: (error: unknown) => error is APIErrorLike;
  isTimeoutError: (error: unknown) => boolean;
}

/**
 * Base class for SDK-backed clients (chat adapters and embedders) that maps
 * SDK failures onto the shared error types:
 * - 429 status -> RateLimitError, carrying `retry-after` when sent
 * - 401/403 status -> ConfigError
 * - SDK timeouts -> TimeoutError
 */
export abstract class BaseProviderAdapter {
  protected abstract readonly errorConfig: ErrorTypeConfig;

  protected mapError(error: unknown): Error {
    if (this.errorConfig.isAPIError(error)) {
      if (error.status === 429) {
        return new RateLimitError(error.message, { cause: error, retryAfter: retryAfterSeconds(error) });
      }
      if (error.status === 401 || error.status === 403) {
        return new ConfigError(error.message, { cause: error });
      }
    }

    if (this.errorConfig.isTimeoutError(error)) {
      return new TimeoutError(error instanceof Error ? error.message : String(error), {
        cause: error,
      });
    }

    if (error instanceof Error) return error;
    return new Error(String(error));
  }
}
