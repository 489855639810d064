export const name = '@leansmith/retrieval';

export * from './types';
export { DocumentChunker, splitSections, SECTION_MARKER } from './chunker';
export { DEFAULT_DOCUMENTS, loadCorpus, materializeDefaultDocuments, type DefaultDocument } from './corpus';
export { cosineSimilarity, linearSearch } from './similarity';
export {
  VectorIndexStore,
  encodeVectors,
  decodeVectors,
  CHUNKS_FILE,
  VECTORS_FILE,
  METADATA_FILE,
} from './store';
export { VectorIndex, FALLBACK_EMBEDDING_DIMS, type VectorIndexOptions } from './vector-index';
