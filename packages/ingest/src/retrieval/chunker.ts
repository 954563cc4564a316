import type { FlatRecord, IndexChunk } from '@notion-rag/shared';

export interface ChunkingConfig {
  targetChunkSize: number; // tokens
  overlap: number; // tokens
}

export const DEFAULT_CHUNKING: ChunkingConfig = { targetChunkSize: 512, overlap: 64 };

export class SimpleChunker {
  constructor(private readonly config: ChunkingConfig = DEFAULT_CHUNKING) {}

  /** Splits a record's text into overlapping windows. Ids are stable: `{sourceId}#{n}`. */
  chunkRecord(record: FlatRecord): IndexChunk[] {
    const text = record.textContent.trim();
    if (!text) return [];
    if (this.estimateTokens(text) <= this.config.targetChunkSize) {
      return [this.toChunk(record, 0, text)];
    }

    const chunks: IndexChunk[] = [];
    const words = text.split(/\s+/);
    // Rough estimate: 3 words per 4 tokens
    const wordsPerChunk = Math.max(1, Math.floor((this.config.targetChunkSize * 3) / 4));
    const overlapWords = Math.min(Math.floor((this.config.overlap * 3) / 4), wordsPerChunk - 1);

    for (let i = 0; i < words.length; i += wordsPerChunk - overlapWords) {
      const chunkWords = words.slice(i, i + wordsPerChunk);
      if (chunkWords.length === 0) break;
      chunks.push(this.toChunk(record, chunks.length, chunkWords.join(' ')));
      if (i + wordsPerChunk >= words.length) break;
    }
    return chunks;
  }

  private toChunk(record: FlatRecord, n: number, text: string): IndexChunk {
    return {
      id: `${record.sourceId}#${n}`,
      sourceId: record.sourceId,
      title: record.title,
      text,
      url: record.url,
      ancestry: record.ancestryPath.join(' / '),
      properties: JSON.stringify(record.propertyBag)
    };
  }

  private estimateTokens(text: string): number {
    // Rough estimate: 1 token ≈ 4 characters for English
    return Math.ceil(text.length / 4);
  }
}
