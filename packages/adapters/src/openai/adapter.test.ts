import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { MemoryLogger } from '@leansmith/shared';
import { OpenAIAdapter, resolveOpenAIKey } from './adapter';
import { ConfigError, ProviderError, RateLimitError } from '../errors';
import type { AdapterContext } from '../types';

const { MockAPIError } = vi.hoisted(() => {
  class MockAPIError extends Error {
    constructor(
      message: string,
      public readonly status: number,
    ) {
      super(message);
    }
  }
  return { MockAPIError };
});

const mockCreate = vi.fn();
const constructorOptions: unknown[] = [];

vi.mock('openai', () => {
  return {
    default: class MockOpenAI {
      chat = {
        completions: {
          create: mockCreate,
        },
      };
      constructor(options: unknown) {
        constructorOptions.push(options);
      }
    },
    APIError: MockAPIError,
    APIConnectionTimeoutError: class extends Error {},
  };
});

describe('OpenAIAdapter', () => {
  let ctx: AdapterContext;
  const originalKey = process.env.OPENAI_API_KEY;

  beforeEach(() => {
    vi.clearAllMocks();
    constructorOptions.length = 0;
    ctx = {
      runId: 'test-run',
      logger: new MemoryLogger(),
      retryOptions: { initialDelayMs: 0 },
    };
  });

  afterEach(() => {
    if (originalKey === undefined) {
      delete process.env.OPENAI_API_KEY;
    } else {
      process.env.OPENAI_API_KEY = originalKey;
    }
  });

  it('requires an API key', () => {
    delete process.env.OPENAI_API_KEY;
    expect(() => new OpenAIAdapter({ type: 'openai', model: 'gpt-4o' })).toThrow(ConfigError);
    expect(() => resolveOpenAIKey({ api_key_env: 'LEANSMITH_TEST_KEY' })).toThrow(
      'Missing API key for OpenAI provider. Checked config.api_key and env var LEANSMITH_TEST_KEY',
    );
  });

  it('reads the key from the environment and disables SDK retries', () => {
    process.env.OPENAI_API_KEY = 'test-secret';
    const adapter = new OpenAIAdapter({ type: 'openai', model: 'gpt-4o' });

    expect(adapter.id()).toBe('openai:gpt-4o');
    expect(constructorOptions[0]).toEqual({
      apiKey: 'test-secret',
      baseURL: undefined,
      maxRetries: 0,
    });
  });

  it('generate returns the completion text', async () => {
    mockCreate.mockResolvedValue({
      choices: [{ message: { content: '{"code":"a + b","proof":"rfl"}' } }],
    });
    const adapter = new OpenAIAdapter({ type: 'openai', model: 'gpt-4o', api_key: 'test-secret' });

    const result = await adapter.generate(
      {
        messages: [
          { role: 'system', content: 'You write Lean 4.' },
          { role: 'user', content: 'Add two numbers' },
        ],
        temperature: 0.1,
        maxTokens: 2000,
      },
      ctx,
    );

    expect(result.text).toBe('{"code":"a + b","proof":"rfl"}');
    expect(mockCreate).toHaveBeenCalledWith(
      {
        model: 'gpt-4o',
        messages: [
          { role: 'system', content: 'You write Lean 4.' },
          { role: 'user', content: 'Add two numbers' },
        ],
        max_tokens: 2000,
        temperature: 0.1,
        response_format: undefined,
      },
      { signal: expect.any(AbortSignal) },
    );
  });

  it('requests JSON output in json mode and defaults the temperature', async () => {
    mockCreate.mockResolvedValue({ choices: [{ message: { content: '{}' } }] });
    const adapter = new OpenAIAdapter({ type: 'openai', model: 'gpt-4o', api_key: 'test-secret' });

    const result = await adapter.generate(
      { messages: [{ role: 'user', content: 'plan' }], jsonMode: true },
      ctx,
    );

    expect(result.text).toBe('{}');
    expect(mockCreate).toHaveBeenCalledWith(
      expect.objectContaining({ response_format: { type: 'json_object' }, temperature: 0.2 }),
      expect.anything(),
    );
  });

  it('maps null content to undefined text', async () => {
    mockCreate.mockResolvedValue({ choices: [{ message: { content: null } }] });
    const adapter = new OpenAIAdapter({ type: 'openai', model: 'gpt-4o', api_key: 'test-secret' });

    const result = await adapter.generate({ messages: [{ role: 'user', content: 'x' }] }, ctx);
    expect(result.text).toBeUndefined();
  });

  it('retries rate limits and surfaces a ProviderError once attempts are spent', async () => {
    mockCreate.mockRejectedValue(new MockAPIError('Too many requests', 429));
    const adapter = new OpenAIAdapter({ type: 'openai', model: 'gpt-4o', api_key: 'test-secret' });

    const promise = adapter.generate({ messages: [{ role: 'user', content: 'x' }] }, ctx);

    await expect(promise).rejects.toBeInstanceOf(ProviderError);
    await expect(promise).rejects.toMatchObject({ cause: expect.any(RateLimitError) });
    expect(mockCreate).toHaveBeenCalledTimes(3);
  });

  it('fails fast on authentication errors', async () => {
    mockCreate.mockRejectedValue(new MockAPIError('Invalid API key', 401));
    const adapter = new OpenAIAdapter({ type: 'openai', model: 'gpt-4o', api_key: 'test-secret' });

    await expect(
      adapter.generate({ messages: [{ role: 'user', content: 'x' }] }, ctx),
    ).rejects.toBeInstanceOf(ConfigError);
    expect(mockCreate).toHaveBeenCalledTimes(1);
  });
});
