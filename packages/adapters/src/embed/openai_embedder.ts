import OpenAI from 'openai';
import type { Embedder } from './embedder';
import { BaseProviderAdapter } from '../base-adapter';
import { openAIErrorConfig, resolveOpenAIKey } from '../openai/adapter';

export interface OpenAIEmbedderConfig {
  apiKey?: string;
  apiKeyEnv?: string;
  model?: string;
  /** Requested output dimensions (text-embedding-3 models only) */
  dimensions?: number;
}

const KNOWN_DIMS: Record<string, number> = {
  'text-embedding-3-small': 1536,
  'text-embedding-3-large': 3072,
  'text-embedding-ada-002': 1536,
};

export class OpenAIEmbedder extends BaseProviderAdapter implements Embedder {
  protected readonly errorConfig = openAIErrorConfig;
  private readonly client: OpenAI;
  private readonly model: string;
  private readonly dimensions?: number;

  constructor(config: OpenAIEmbedderConfig) {
    super();
    this.model = config.model || 'text-embedding-3-small';
    this.dimensions = config.dimensions;
    this.client = new OpenAI({
      apiKey: resolveOpenAIKey({ api_key: config.apiKey, api_key_env: config.apiKeyEnv }),
    });
  }

  async embedTexts(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }
    try {
      const response = await this.client.embeddings.create({
        model: this.model,
        input: texts,
        dimensions: this.dimensions,
      });
      // Order is not guaranteed by the wire format; `index` is.
      return [...response.data].sort((a, b) => a.index - b.index).map((d) => d.embedding);
    } catch (error) {
      throw this.mapError(error);
    }
  }

  dims(): number {
    return this.dimensions ?? KNOWN_DIMS[this.model] ?? 0;
  }

  /** Includes requested dimensions: vectors of different widths are not comparable. */
  id(): string {
    return this.dimensions ? `openai:${this.model}:${this.dimensions}` : `openai:${this.model}`;
  }
}
