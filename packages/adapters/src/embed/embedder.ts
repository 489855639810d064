/**
 * Turns texts into fixed-dimensionality vectors, one per input, same order.
 */
export interface Embedder {
  embedTexts(texts: string[]): Promise<number[][]>;
  /** Vector length, or 0 when it is not known before the first call */
  dims(): number;
  id(): string;
}
