import type { EmbeddingsConfig } from '@leansmith/shared';
import type { Embedder } from './embedder';
import { OpenAIEmbedder } from './openai_embedder';
import { LocalHashEmbedder } from './local_hash_embedder';
import { CachingEmbedder } from './caching_embedder';
import { ConfigError } from '../errors';

export interface EmbedderFactoryOptions {
  apiKey?: string;
  apiKeyEnv?: string;
}

export function createEmbedder(
  config: EmbeddingsConfig,
  options: EmbedderFactoryOptions = {},
): Embedder {
  let embedder: Embedder;
  switch (config.provider) {
    case 'openai':
      embedder = new OpenAIEmbedder({
        apiKey: options.apiKey,
        apiKeyEnv: options.apiKeyEnv,
        model: config.model,
        dimensions: config.dims,
      });
      break;
    case 'local-hash':
      embedder = new LocalHashEmbedder(config.dims);
      break;
    default:
      throw new ConfigError(`Unsupported embedder provider: ${String(config.provider)}`);
  }

  return new CachingEmbedder(embedder);
}
