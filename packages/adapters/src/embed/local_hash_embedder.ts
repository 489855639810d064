import { createHash } from 'crypto';
import type { Embedder } from './embedder';

const TOKEN_PATTERN = /[\p{L}\p{N}_']+/gu;

/**
 * Offline embedder using signed feature hashing over lower-cased word tokens.
 * Texts sharing vocabulary get positive cosine similarity; a text with no
 * tokens maps to the zero vector.
 */
export class LocalHashEmbedder implements Embedder {
  constructor(private readonly dimensions: number = 384) {
    if (!Number.isInteger(dimensions) || dimensions < 1) {
      throw new Error(`LocalHashEmbedder dimensions must be a positive integer, got ${dimensions}`);
    }
  }

  async embedTexts(texts: string[]): Promise<number[][]> {
    return texts.map((text) => this.embedOne(text));
  }

  dims(): number {
    return this.dimensions;
  }

  id(): string {
    return `local-hash:${this.dimensions}`;
  }

  private embedOne(text: string): number[] {
    const vector = new Array<number>(this.dimensions).fill(0);
    for (const token of text.toLowerCase().match(TOKEN_PATTERN) ?? []) {
      const digest = createHash('sha256').update(token).digest();
      const bucket = digest.readUInt32BE(0) % this.dimensions;
      const sign = (digest[4] ?? 0) & 1 ? -1 : 1;
      vector[bucket] = (vector[bucket] ?? 0) + sign;
    }
    return l2Normalize(vector);
  }
}

function l2Normalize(values: number[]): number[] {
  const norm = Math.sqrt(values.reduce((sum, v) => sum + v * v, 0));
  if (norm === 0) {
    return values;
  }
  return values.map((v) => v / norm);
}
