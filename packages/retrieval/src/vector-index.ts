import type { Embedder } from '@leansmith/adapters';
import { errorMessage, eventMeta, type Logger } from '@leansmith/shared';
import { DocumentChunker, splitSections } from './chunker';
import { loadCorpus, materializeDefaultDocuments } from './corpus';
import { linearSearch } from './similarity';
import { VectorIndexStore } from './store';
import type { Chunk, IndexMetadata, IndexState, IndexStatus, SearchResult } from './types';

/** Zero-fill width when neither the embedder nor any batch reports one. */
export const FALLBACK_EMBEDDING_DIMS = 1536;

export interface VectorIndexOptions {
  embedder: Embedder;
  logger: Logger;
  documentsDir: string;
  indexDir: string;
  chunkSize: number;
  overlapSize: number;
  /** Default k for search */
  maxChunks: number;
  batchSize: number;
  runId?: string;
}

/**
 * Chunk store with parallel embedding vectors. Loaded from disk on first
 * use, or built from the documents directory when nothing valid is
 * persisted. Every mutation re-persists the whole index.
 */
export class VectorIndex {
  private readonly chunker: DocumentChunker;
  private readonly store: VectorIndexStore;
  private readonly runId: string;
  private state?: IndexState;
  private initializing?: Promise<IndexState>;

  constructor(private readonly options: VectorIndexOptions) {
    this.chunker = new DocumentChunker(options.chunkSize, options.overlapSize);
    this.store = new VectorIndexStore(options.indexDir, options.logger);
    this.runId = options.runId ?? 'index';
  }

  /** Loads or builds the index once; concurrent callers share the work. */
  async init(): Promise<IndexState> {
    if (this.state) return this.state;
    if (!this.initializing) {
      this.initializing = this.build().finally(() => {
        this.initializing = undefined;
      });
    }
    return this.initializing;
  }

  /**
   * Loads the persisted index, or rebuilds it from the corpus when it is
   * missing, inconsistent, embedded with a different model or width, or
   * `force` is set.
   */
  async build(options: { force?: boolean } = {}): Promise<IndexState> {
    const { logger, embedder } = this.options;
    const started = Date.now();

    if (!options.force) {
      const persisted = await this.store.load();
      const stale = persisted ? this.staleReason(persisted.metadata) : undefined;
      if (persisted && !stale) {
        this.state = persisted;
        await logger.log({
          ...eventMeta(this.runId),
          type: 'IndexLoaded',
          payload: {
            source: 'disk',
            chunkCount: persisted.chunks.length,
            documentCount: new Set(persisted.chunks.map((c) => c.source)).size,
            durationMs: Date.now() - started,
          },
        });
        return persisted;
      }
      if (stale) {
        await logger.info(stale);
      }
    }

    let documents = await loadCorpus(this.options.documentsDir, logger);
    if (documents.length === 0) {
      await logger.info(`No documents in ${this.options.documentsDir}, writing the default documents`);
      documents = await materializeDefaultDocuments(this.options.documentsDir);
    }

    const chunks = this.chunker.chunk(documents);
    const { vectors, dims } = await this.embedChunks(chunks);
    const state: IndexState = { chunks, vectors, metadata: this.metadataFor(chunks.length, dims) };

    if (chunks.length > 0) {
      await this.store.save(state.chunks, state.vectors, state.metadata);
    }
    this.state = state;

    await logger.log({
      ...eventMeta(this.runId),
      type: 'IndexLoaded',
      payload: {
        source: 'corpus',
        chunkCount: chunks.length,
        documentCount: new Set(documents.map((d) => d.source)).size,
        durationMs: Date.now() - started,
      },
    });
    return state;
  }

  /**
   * Top-k chunks by cosine similarity to `query`. Never throws: failures
   * are logged and answered with no results.
   */
  async search(query: string, k: number = this.options.maxChunks): Promise<SearchResult[]> {
    if (k <= 0) return [];
    const { logger, embedder } = this.options;
    const started = Date.now();

    try {
      const state = await this.init();
      if (state.chunks.length === 0) return [];

      const [queryVector] = await embedder.embedTexts([query]);
      if (!queryVector) {
        throw new Error('Embedder returned no vector for the query');
      }

      const results = linearSearch(queryVector, state.chunks, state.vectors, k);
      await logger.log({
        ...eventMeta(this.runId),
        type: 'SemanticSearchFinished',
        payload: {
          query,
          topK: k,
          hitCount: results.length,
          candidateCount: state.chunks.length,
          durationMs: Date.now() - started,
        },
      });
      return results;
    } catch (error) {
      await logger.log({
        ...eventMeta(this.runId),
        type: 'SemanticSearchFailed',
        payload: { query, error: errorMessage(error) },
      });
      await logger.warn(`Semantic search failed: ${errorMessage(error)}`);
      return [];
    }
  }

  /**
   * Search results rendered for a prompt; empty when nothing matched.
   */
  async getContext(query: string, maxChunks: number = this.options.maxChunks): Promise<string> {
    const results = await this.search(query, maxChunks);
    return results.map((r) => `Source: ${r.source}\n${r.content}\n`).join('\n---\n');
  }

  /**
   * Chunks, embeds and appends `content`, then persists the whole index.
   * Returns the number of chunks added.
   */
  async add(content: string, source = 'user_added'): Promise<number> {
    const state = await this.init();
    const chunks = this.chunker.chunk(splitSections(content, source), state.chunks.length);
    if (chunks.length === 0) return 0;

    const preferredDims = state.chunks.length > 0 ? state.metadata.dims : undefined;
    const { vectors, dims } = await this.embedChunks(chunks, preferredDims);

    const next: IndexState = {
      chunks: [...state.chunks, ...chunks],
      vectors: [...state.vectors, ...vectors],
      metadata: this.metadataFor(state.chunks.length + chunks.length, preferredDims ?? dims),
    };
    await this.store.save(next.chunks, next.vectors, next.metadata);
    this.state = next;

    await this.options.logger.log({
      ...eventMeta(this.runId),
      type: 'IndexUpdated',
      payload: { source, addedChunks: chunks.length, totalChunks: next.chunks.length },
    });
    return chunks.length;
  }

  /** Reports what is on disk without loading or building anything. */
  async status(): Promise<IndexStatus> {
    const persisted = await this.store.exists();
    const metadata = persisted ? await this.store.readMetadata() : undefined;
    return {
      persisted,
      chunkCount: this.state?.chunks.length ?? metadata?.num_chunks ?? 0,
      metadata: this.state?.metadata ?? metadata,
    };
  }

  /** Why a persisted index cannot serve the current embedder, if it cannot. */
  private staleReason(metadata: IndexMetadata): string | undefined {
    const { embedder } = this.options;
    if (metadata.embedding_model !== embedder.id()) {
      return `Index was embedded with ${metadata.embedding_model}, rebuilding for ${embedder.id()}`;
    }
    const dims = embedder.dims();
    if (dims > 0 && metadata.dims !== dims) {
      return `Index vectors have ${metadata.dims} dimensions, rebuilding for ${dims}`;
    }
    return undefined;
  }

  private metadataFor(count: number, dims: number): IndexMetadata {
    return {
      num_chunks: count,
      embedding_model: this.options.embedder.id(),
      chunk_size: this.options.chunkSize,
      overlap_size: this.options.overlapSize,
      dims,
    };
  }

  /**
   * Embeds in batches. A failed batch becomes zero vectors so every chunk
   * keeps a vector.
   */
  private async embedChunks(
    chunks: readonly Chunk[],
    preferredDims?: number,
  ): Promise<{ vectors: Float32Array[]; dims: number }> {
    const { embedder, logger, batchSize } = this.options;
    const batches: (number[][] | { failed: number; error: string })[] = [];

    for (let start = 0; start < chunks.length; start += batchSize) {
      const batch = chunks.slice(start, start + batchSize);
      try {
        const vectors = await embedder.embedTexts(batch.map((c) => c.content));
        if (vectors.length !== batch.length) {
          throw new Error(`expected ${batch.length} vectors, got ${vectors.length}`);
        }
        batches.push(vectors);
      } catch (error) {
        batches.push({ failed: batch.length, error: errorMessage(error) });
      }
    }

    const firstVector = batches.flatMap((b) => (Array.isArray(b) ? b : []))[0];
    const dims = preferredDims || embedder.dims() || firstVector?.length || FALLBACK_EMBEDDING_DIMS;

    const vectors: Float32Array[] = [];
    for (const [batchIndex, batch] of batches.entries()) {
      if (Array.isArray(batch)) {
        vectors.push(...batch.map((v) => Float32Array.from(v)));
        continue;
      }
      await logger.log({
        ...eventMeta(this.runId),
        type: 'EmbeddingBatchFailed',
        payload: { batchIndex, batchSize: batch.failed, dims, error: batch.error },
      });
      await logger.warn(`Embedding batch ${batchIndex} failed, using zero vectors: ${batch.error}`);
      for (let i = 0; i < batch.failed; i++) {
        vectors.push(new Float32Array(dims));
      }
    }

    return { vectors, dims };
  }
}
