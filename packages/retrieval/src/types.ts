/**
 * A window of a source document, the unit of retrieval.
 */
export interface Chunk {
  content: string;
  /** File name (or caller-supplied label) the content came from */
  source: string;
  /** Section index within the source document */
  position: number;
  /** Unique and sequential within an index */
  id: number;
}

/** A section of a document, before windowing. */
export interface SourceDocument {
  content: string;
  source: string;
  section: number;
}

export interface IndexMetadata {
  num_chunks: number;
  embedding_model: string;
  chunk_size: number;
  overlap_size: number;
  dims: number;
}

export type SearchResult = Chunk & {
  /** Cosine similarity in [-1, 1] */
  similarity: number;
};

/** In-memory index: `vectors[i]` is the embedding of `chunks[i]`. */
export interface IndexState {
  chunks: Chunk[];
  vectors: Float32Array[];
  metadata: IndexMetadata;
}

export interface IndexStatus {
  persisted: boolean;
  chunkCount: number;
  metadata?: IndexMetadata;
}
