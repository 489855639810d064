import { describe, it, expect, vi, afterEach } from 'vitest';

const mockEmbeddingsCreate = vi.fn();

vi.mock('openai', () => {
  return {
    default: class MockOpenAI {
      embeddings = {
        create: mockEmbeddingsCreate,
      };
    },
    APIError: class extends Error {},
    APIConnectionTimeoutError: class extends Error {},
  };
});

import { createEmbedder } from './factory';

describe('createEmbedder', () => {
  const originalKey = process.env.OPENAI_API_KEY;

  afterEach(() => {
    vi.clearAllMocks();
    if (originalKey === undefined) {
      delete process.env.OPENAI_API_KEY;
    } else {
      process.env.OPENAI_API_KEY = originalKey;
    }
  });

  it('creates a cached local-hash embedder', async () => {
    const embedder = createEmbedder({
      provider: 'local-hash',
      model: 'ignored',
      dims: 16,
      batchSize: 1,
    });

    expect(embedder.dims()).toBe(16);
    expect(embedder.id()).toBe('local-hash:16');
    expect(await embedder.embedTexts(['hello'])).toHaveLength(1);
  });

  it('defaults local-hash dimensions to 384', () => {
    const embedder = createEmbedder({ provider: 'local-hash', model: 'x', batchSize: 10 });
    expect(embedder.dims()).toBe(384);
  });

  it('creates a cached OpenAI embedder using OPENAI_API_KEY', async () => {
    process.env.OPENAI_API_KEY = 'test-secret';
    mockEmbeddingsCreate.mockResolvedValue({ data: [{ index: 0, embedding: [1, 2, 3] }] });

    const embedder = createEmbedder({
      provider: 'openai',
      model: 'text-embedding-3-small',
      batchSize: 100,
    });

    expect(embedder.id()).toBe('openai:text-embedding-3-small');
    expect(embedder.dims()).toBe(1536);
    await expect(embedder.embedTexts(['hello'])).resolves.toEqual([[1, 2, 3]]);
  });
});
