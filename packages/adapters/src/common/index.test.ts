import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { MemoryLogger } from '@leansmith/shared';
import { executeProviderRequest, nextDelayMs, retryDelayMs } from './index';
import type { AdapterContext } from '../types';
import { ConfigError, ProviderError, RateLimitError, TimeoutError } from '../errors';

type RequestFn = (signal: AbortSignal) => Promise<string>;

describe('executeProviderRequest', () => {
  let logger: MemoryLogger;
  let ctx: AdapterContext;

  beforeEach(() => {
    logger = new MemoryLogger();
    ctx = {
      runId: 'test-run',
      logger,
      retryOptions: { initialDelayMs: 0 },
    };
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('returns the first successful result without retries', async () => {
    const fn = vi.fn<RequestFn>().mockResolvedValue('success');

    const result = await executeProviderRequest(ctx, 'openai', 'gpt-4o', fn);

    expect(result).toBe('success');
    expect(fn).toHaveBeenCalledTimes(1);
    expect(logger.events.map((e) => e.type)).toEqual([
      'ProviderRequestStarted',
      'ProviderRequestFinished',
    ]);
    expect(logger.eventsOfType('ProviderRequestStarted')[0]?.payload).toEqual({
      provider: 'openai',
      model: 'gpt-4o',
    });
    expect(logger.eventsOfType('ProviderRequestFinished')[0]?.payload).toMatchObject({
      provider: 'openai',
      success: true,
      retries: 0,
    });
  });

  it('retries any failure until a call succeeds', async () => {
    const fn = vi
      .fn<RequestFn>()
      .mockRejectedValueOnce(new Error('socket hang up'))
      .mockRejectedValueOnce(new Error('bad gateway'))
      .mockResolvedValue('success');

    const result = await executeProviderRequest(ctx, 'openai', 'gpt-4o', fn);

    expect(result).toBe('success');
    expect(fn).toHaveBeenCalledTimes(3);
    expect(logger.eventsOfType('ProviderRequestFinished')[0]?.payload).toMatchObject({
      success: true,
      retries: 2,
    });
    expect(logger.entries.map((e) => e.message)).toEqual([
      'openai request failed (attempt 1/3): socket hang up',
      'openai request failed (attempt 2/3): bad gateway',
    ]);
  });

  it('makes at most maxAttempts calls, then throws ProviderError with the last cause', async () => {
    const last = new Error('boom 3');
    const fn = vi
      .fn<RequestFn>()
      .mockRejectedValueOnce(new Error('boom 1'))
      .mockRejectedValueOnce(new Error('boom 2'))
      .mockRejectedValueOnce(last);

    const promise = executeProviderRequest(ctx, 'openai', 'gpt-4o', fn);

    await expect(promise).rejects.toThrow(ProviderError);
    await expect(promise).rejects.toMatchObject({
      message: 'openai request failed after 3 attempt(s): boom 3',
      cause: last,
    });
    expect(fn).toHaveBeenCalledTimes(3);
    expect(logger.eventsOfType('ProviderRequestFinished')[0]?.payload).toMatchObject({
      success: false,
      error: 'boom 3',
      retries: 2,
    });
  });

  it('honours a per-call override of maxAttempts', async () => {
    const fn = vi.fn<RequestFn>().mockRejectedValue(new Error('down'));

    await expect(
      executeProviderRequest(ctx, 'openai', 'gpt-4o', fn, { maxAttempts: 1 }),
    ).rejects.toThrow('openai request failed after 1 attempt(s): down');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('does not retry configuration errors and rethrows them unchanged', async () => {
    const configError = new ConfigError('Missing API key');
    const fn = vi.fn<RequestFn>().mockRejectedValue(configError);

    await expect(executeProviderRequest(ctx, 'openai', 'gpt-4o', fn)).rejects.toBe(configError);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('aborts slow calls after timeoutMs and retries them', async () => {
    ctx.timeoutMs = 10;
    const fn = vi.fn<RequestFn>().mockImplementation(
      (signal) =>
        new Promise<string>((_resolve, reject) => {
          signal.addEventListener('abort', () => reject(signal.reason));
        }),
    );

    const promise = executeProviderRequest(ctx, 'openai', 'gpt-4o', fn, { maxAttempts: 2 });

    await expect(promise).rejects.toBeInstanceOf(ProviderError);
    await expect(promise).rejects.toMatchObject({ cause: expect.any(TimeoutError) });
    expect(fn).toHaveBeenCalledTimes(2);
  });
});

describe('retryDelayMs', () => {
  const options = { maxAttempts: 3, initialDelayMs: 1000, maxDelayMs: 30_000, backoffFactor: 2 };

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('doubles the delay per retry and caps it', () => {
    vi.spyOn(Math, 'random').mockReturnValue(0.5);

    expect(retryDelayMs(1, options)).toBe(1000);
    expect(retryDelayMs(2, options)).toBe(2000);
    expect(retryDelayMs(3, options)).toBe(4000);
    expect(retryDelayMs(6, options)).toBe(30_000);
  });

  it('applies at most 10% jitter', () => {
    vi.spyOn(Math, 'random').mockReturnValue(0);
    expect(retryDelayMs(1, options)).toBe(900);

    vi.spyOn(Math, 'random').mockReturnValue(1);
    expect(retryDelayMs(1, options)).toBe(1100);
  });
});

describe('nextDelayMs', () => {
  const options = { maxAttempts: 3, initialDelayMs: 1000, maxDelayMs: 30_000, backoffFactor: 2 };

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('waits for the server-suggested retryAfter on rate limits', () => {
    expect(nextDelayMs(new RateLimitError('slow down', { retryAfter: 7 }), 1, options)).toBe(7000);
  });

  it('caps retryAfter at maxDelayMs', () => {
    expect(nextDelayMs(new RateLimitError('slow down', { retryAfter: 120 }), 1, options)).toBe(30_000);
  });

  it('falls back to exponential backoff otherwise', () => {
    vi.spyOn(Math, 'random').mockReturnValue(0.5);

    expect(nextDelayMs(new RateLimitError('slow down'), 2, options)).toBe(2000);
    expect(nextDelayMs(new Error('bad gateway'), 3, options)).toBe(4000);
  });
});
