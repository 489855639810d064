import { promises as fs } from 'fs';
import { join } from 'path';
import { pathExists } from 'fs-extra';
import { z } from 'zod';
import { IndexError, atomicWrite, errorMessage, readTextIfExists, type Logger } from '@leansmith/shared';
import type { Chunk, IndexMetadata, IndexState } from './types';

export const CHUNKS_FILE = 'chunks.json';
export const VECTORS_FILE = 'vectors.f32';
export const METADATA_FILE = 'metadata.json';

const FLOAT_BYTES = 4;

const ChunkSchema = z.object({
  content: z.string(),
  source: z.string(),
  position: z.number().int().nonnegative(),
  id: z.number().int().nonnegative(),
});

const MetadataSchema = z.object({
  num_chunks: z.number().int().nonnegative(),
  embedding_model: z.string(),
  chunk_size: z.number().int().positive(),
  overlap_size: z.number().int().nonnegative(),
  dims: z.number().int().nonnegative(),
});

/**
 * Persists an index as three co-located files: the chunk array as JSON,
 * the vectors as row-major little-endian float32, and the metadata record.
 */
export class VectorIndexStore {
  constructor(
    readonly dir: string,
    private readonly logger: Logger,
  ) {}

  async exists(): Promise<boolean> {
    for (const file of [CHUNKS_FILE, VECTORS_FILE, METADATA_FILE]) {
      if (!(await pathExists(join(this.dir, file)))) return false;
    }
    return true;
  }

  /**
   * Loads the persisted index. A missing file or any inconsistency between
   * the three files yields undefined.
   */
  async load(): Promise<IndexState | undefined> {
    if (!(await this.exists())) {
      return undefined;
    }

    try {
      const metadataText = await readTextIfExists(join(this.dir, METADATA_FILE));
      const chunksText = await readTextIfExists(join(this.dir, CHUNKS_FILE));
      if (metadataText === undefined || chunksText === undefined) {
        return undefined;
      }

      const metadata = MetadataSchema.safeParse(JSON.parse(metadataText));
      const chunks = z.array(ChunkSchema).safeParse(JSON.parse(chunksText));
      if (!metadata.success || !chunks.success) {
        await this.logger.warn(`Ignoring index at ${this.dir}: malformed chunks or metadata`);
        return undefined;
      }

      const { num_chunks: count, dims } = metadata.data;
      const bytes = await fs.readFile(join(this.dir, VECTORS_FILE));
      if (chunks.data.length !== count || bytes.byteLength !== count * dims * FLOAT_BYTES) {
        await this.logger.warn(
          `Ignoring index at ${this.dir}: expected ${count} chunks of ${dims} dims, found ${chunks.data.length} chunks and ${bytes.byteLength} vector bytes`,
        );
        return undefined;
      }

      return { chunks: chunks.data, vectors: decodeVectors(bytes, count, dims), metadata: metadata.data };
    } catch (error) {
      await this.logger.warn(`Ignoring index at ${this.dir}: ${errorMessage(error)}`);
      return undefined;
    }
  }

  /**
   * Writes all three files. Metadata goes last so that a reader that sees
   * it also sees matching chunks and vectors.
   */
  async save(chunks: readonly Chunk[], vectors: readonly Float32Array[], metadata: IndexMetadata): Promise<void> {
    if (chunks.length !== vectors.length || chunks.length !== metadata.num_chunks) {
      throw new IndexError(
        `Index is inconsistent: ${chunks.length} chunks, ${vectors.length} vectors, metadata count ${metadata.num_chunks}`,
      );
    }
    const ragged = vectors.findIndex((v) => v.length !== metadata.dims);
    if (ragged !== -1) {
      throw new IndexError(
        `Vector ${ragged} has ${vectors[ragged]?.length ?? 0} dims, expected ${metadata.dims}`,
      );
    }

    await atomicWrite(join(this.dir, VECTORS_FILE), encodeVectors(vectors, metadata.dims));
    await atomicWrite(join(this.dir, CHUNKS_FILE), JSON.stringify(chunks));
    await atomicWrite(join(this.dir, METADATA_FILE), JSON.stringify(metadata, null, 2));
  }

  async readMetadata(): Promise<IndexMetadata | undefined> {
    const text = await readTextIfExists(join(this.dir, METADATA_FILE));
    if (text === undefined) return undefined;
    try {
      const parsed = MetadataSchema.safeParse(JSON.parse(text));
      return parsed.success ? parsed.data : undefined;
    } catch (error) {
      await this.logger.debug(`Unreadable index metadata: ${errorMessage(error)}`);
      return undefined;
    }
  }
}

export function encodeVectors(vectors: readonly Float32Array[], dims: number): Uint8Array {
  const bytes = new Uint8Array(vectors.length * dims * FLOAT_BYTES);
  const view = new DataView(bytes.buffer);
  vectors.forEach((vector, row) => {
    for (let col = 0; col < dims; col++) {
      view.setFloat32((row * dims + col) * FLOAT_BYTES, vector[col] ?? 0, true);
    }
  });
  return bytes;
}

export function decodeVectors(bytes: Uint8Array, count: number, dims: number): Float32Array[] {
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const vectors: Float32Array[] = [];
  for (let row = 0; row < count; row++) {
    const vector = new Float32Array(dims);
    for (let col = 0; col < dims; col++) {
      vector[col] = view.getFloat32((row * dims + col) * FLOAT_BYTES, true);
    }
    vectors.push(vector);
  }
  return vectors;
}
