import { describe, it, expect, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import * as os from 'os';
import { join } from 'path';
import { IndexError, MemoryLogger } from '@leansmith/shared';
import { METADATA_FILE, VECTORS_FILE, VectorIndexStore, decodeVectors, encodeVectors } from './store';
import type { Chunk, IndexMetadata } from './types';

const chunks: Chunk[] = [
  { content: 'theorem a', source: 'a.txt', position: 0, id: 0 },
  { content: 'def b', source: 'b.txt', position: 2, id: 1 },
];

const metadata: IndexMetadata = {
  num_chunks: 2,
  embedding_model: 'local-hash:3',
  chunk_size: 1000,
  overlap_size: 200,
  dims: 3,
};

const vectors = [new Float32Array([0.5, -1.25, 0]), new Float32Array([1, 2, 3])];

describe('VectorIndexStore', () => {
  let tmpDir = '';

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  async function createStore() {
    tmpDir = await fs.mkdtemp(join(os.tmpdir(), 'leansmith-store-'));
    const logger = new MemoryLogger();
    return { store: new VectorIndexStore(join(tmpDir, 'index'), logger), logger };
  }

  it('round-trips chunks, vectors and metadata', async () => {
    const { store } = await createStore();

    await store.save(chunks, vectors, metadata);
    const loaded = await store.load();

    expect(loaded?.chunks).toEqual(chunks);
    expect(loaded?.metadata).toEqual(metadata);
    expect(loaded?.vectors.map((v) => Array.from(v))).toEqual([
      [0.5, -1.25, 0],
      [1, 2, 3],
    ]);
    expect((await fs.stat(join(store.dir, VECTORS_FILE))).size).toBe(24);
  });

  it('treats a missing file as no index', async () => {
    const { store } = await createStore();
    await store.save(chunks, vectors, metadata);
    await fs.rm(join(store.dir, METADATA_FILE));

    expect(await store.exists()).toBe(false);
    expect(await store.load()).toBeUndefined();
  });

  it('treats a truncated vector file as no index', async () => {
    const { store, logger } = await createStore();
    await store.save(chunks, vectors, metadata);
    await fs.writeFile(join(store.dir, VECTORS_FILE), new Uint8Array(12));

    expect(await store.load()).toBeUndefined();
    expect(logger.entries.map((e) => e.message)).toEqual([
      `Ignoring index at ${store.dir}: expected 2 chunks of 3 dims, found 2 chunks and 12 vector bytes`,
    ]);
  });

  it('treats malformed metadata as no index', async () => {
    const { store } = await createStore();
    await store.save(chunks, vectors, metadata);
    await fs.writeFile(join(store.dir, METADATA_FILE), '{"num_chunks": "two"}');

    expect(await store.load()).toBeUndefined();
    expect(await store.readMetadata()).toBeUndefined();
  });

  it('rejects vectors that do not match the metadata', async () => {
    const { store } = await createStore();

    await expect(store.save(chunks, [vectors[0] ?? new Float32Array(3)], metadata)).rejects.toThrow(
      IndexError,
    );
    await expect(
      store.save(chunks, [new Float32Array(3), new Float32Array(2)], metadata),
    ).rejects.toThrow('Vector 1 has 2 dims, expected 3');
    expect(await store.exists()).toBe(false);
  });
});

describe('vector encoding', () => {
  it('writes little-endian float32 rows', () => {
    const bytes = encodeVectors([new Float32Array([1])], 1);
    expect(Array.from(bytes)).toEqual([0, 0, 0x80, 0x3f]);
    expect(Array.from(decodeVectors(bytes, 1, 1)[0] ?? [])).toEqual([1]);
  });
});
