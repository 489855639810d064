/**
 * Where stages get their retrieval context. `VectorIndex` satisfies it;
 * implementations must answer failures with an empty string.
 */
export interface ContextSource {
  getContext(query: string, maxChunks: number): Promise<string>;
}

/** Context source for runs without an index. */
export const NO_CONTEXT: ContextSource = {
  getContext: async () => '',
};
