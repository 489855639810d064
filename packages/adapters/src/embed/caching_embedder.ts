import { hash } from 'ohash';
import { LRUCache } from '@leansmith/shared';
import type { Embedder } from './embedder';

/** Maximum number of cached vectors (LRU eviction) */
const EMBEDDING_CACHE_MAX_SIZE = 2000;

/**
 * Caches vectors per input text; only texts not seen before reach the
 * underlying embedder, in one call.
 */
export class CachingEmbedder implements Embedder {
  private readonly cache: LRUCache<string, number[]>;

  constructor(
    private readonly underlyingEmbedder: Embedder,
    maxEntries: number = EMBEDDING_CACHE_MAX_SIZE,
  ) {
    this.cache = new LRUCache(maxEntries);
  }

  async embedTexts(texts: string[]): Promise<number[][]> {
    const keys = texts.map((text) => hash([this.underlyingEmbedder.id(), text]));
    const found = new Map<string, number[]>();
    const missing: string[] = [];
    const missingKeys: string[] = [];

    keys.forEach((key, i) => {
      const cached = this.cache.get(key);
      if (cached) {
        found.set(key, cached);
      } else if (!missingKeys.includes(key)) {
        missingKeys.push(key);
        missing.push(texts[i] ?? '');
      }
    });

    if (missing.length > 0) {
      const vectors = await this.underlyingEmbedder.embedTexts(missing);
      if (vectors.length !== missing.length) {
        throw new Error(
          `Embedder ${this.underlyingEmbedder.id()} returned ${vectors.length} vectors for ${missing.length} texts`,
        );
      }
      missingKeys.forEach((key, i) => {
        const vector = vectors[i] ?? [];
        this.cache.set(key, vector);
        found.set(key, vector);
      });
    }

    return keys.map((key) => found.get(key) ?? []);
  }

  dims(): number {
    return this.underlyingEmbedder.dims();
  }

  /** Cached vectors are the underlying embedder's, so the identity is too. */
  id(): string {
    return this.underlyingEmbedder.id();
  }
}
