import { ConfigError } from '@leansmith/shared';
import type { Chunk, SourceDocument } from './types';

/** Explicit section boundary inside corpus documents. */
export const SECTION_MARKER = '<EOC>';

/**
 * Splits raw document text on the section marker. Blank sections are
 * dropped and kept sections are trimmed; `section` is the index in the
 * unfiltered split, so positions stay stable when blank sections exist.
 */
export function splitSections(content: string, source: string): SourceDocument[] {
  return content
    .split(SECTION_MARKER)
    .map((section, index) => ({ content: section.trim(), source, section: index }))
    .filter((doc) => doc.content.length > 0);
}

export class DocumentChunker {
  constructor(
    readonly chunkSize: number,
    readonly overlapSize: number,
  ) {
    if (!Number.isInteger(chunkSize) || chunkSize < 1) {
      throw new ConfigError(`chunkSize must be a positive integer, got ${chunkSize}`);
    }
    if (!Number.isInteger(overlapSize) || overlapSize < 0 || overlapSize >= chunkSize) {
      throw new ConfigError(
        `overlapSize must be an integer in [0, chunkSize), got ${overlapSize} with chunkSize ${chunkSize}`,
      );
    }
  }

  /**
   * Windows every document, numbering chunks from `firstId`.
   */
  chunk(documents: readonly SourceDocument[], firstId = 0): Chunk[] {
    const step = this.chunkSize - this.overlapSize;
    const chunks: Chunk[] = [];

    for (const doc of documents) {
      for (let start = 0; start < doc.content.length; start += step) {
        const content = doc.content.slice(start, start + this.chunkSize);
        if (!content.trim()) continue;
        chunks.push({
          content,
          source: doc.source,
          position: doc.section,
          id: firstId + chunks.length,
        });
      }
    }

    return chunks;
  }
}
