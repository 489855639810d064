import pc from 'picocolors';
import type { Colors } from '@leansmith/eval';
import type { IndexStatus, SearchResult } from '@leansmith/retrieval';
import type { Solution } from '@leansmith/shared';

const PREVIEW_LENGTH = 300;

export class OutputRenderer {
  constructor(
    private readonly isJson: boolean,
    private readonly write: (line: string) => void = console.log,
    private readonly colors: Colors = pc,
  ) {}

  json(data: unknown): void {
    this.write(JSON.stringify(data, null, 2));
  }

  solution(taskId: string, solution: Solution): void {
    if (this.isJson) {
      this.json({ taskId, ...solution });
      return;
    }
    const c = this.colors;
    this.write(c.bold(`Solution for ${taskId}`));
    this.write(c.bold('\nCode:'));
    this.write(solution.code);
    this.write(c.bold('\nProof:'));
    this.write(solution.proof);
  }

  indexStatus(status: IndexStatus, indexDir: string): void {
    if (this.isJson) {
      this.json({ indexDir, ...status });
      return;
    }
    if (!status.persisted) {
      this.write(this.colors.yellow(`No index found at ${indexDir}`));
      return;
    }
    this.write(`Index found at: ${indexDir}`);
    this.write(`Chunks: ${status.chunkCount}`);
    if (status.metadata) {
      const m = status.metadata;
      this.write(`Embedding model: ${m.embedding_model} (${m.dims} dims)`);
      this.write(`Chunk size: ${m.chunk_size}, overlap: ${m.overlap_size}`);
    }
  }

  indexBuilt(chunkCount: number, model: string, indexDir: string): void {
    if (this.isJson) {
      this.json({ indexDir, chunkCount, model });
      return;
    }
    this.write(this.colors.green(`Index ready at ${indexDir}`));
    this.write(`- ${chunkCount} chunks embedded with ${model}`);
  }

  chunksAdded(added: number, source: string): void {
    if (this.isJson) {
      this.json({ source, added });
      return;
    }
    if (added === 0) {
      this.write(`Nothing to add from ${source}`);
      return;
    }
    this.write(`Added ${added} chunk${added === 1 ? '' : 's'} from ${source}`);
  }

  searchResults(results: readonly SearchResult[]): void {
    if (this.isJson) {
      this.json(results);
      return;
    }
    if (results.length === 0) {
      this.write('No results found.');
      return;
    }
    for (const hit of results) {
      const preview =
        hit.content.length > PREVIEW_LENGTH ? `${hit.content.slice(0, PREVIEW_LENGTH)}...` : hit.content;
      this.write(`${this.colors.bold(hit.source)} #${hit.id} (score: ${hit.similarity.toFixed(4)})`);
      this.write('---');
      this.write(preview);
      this.write('---\n');
    }
  }
}
