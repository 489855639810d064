export type { Embedder } from './embedder';
export { OpenAIEmbedder, type OpenAIEmbedderConfig } from './openai_embedder';
export { LocalHashEmbedder } from './local_hash_embedder';
export { CachingEmbedder } from './caching_embedder';
export { createEmbedder, type EmbedderFactoryOptions } from './factory';
