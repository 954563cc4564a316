import type { IndexChunk } from '@notion-rag/shared';

export interface Embedder {
  embed(batch: string[]): Promise<number[][]>;
}

export interface VectorStoreInit {
  /** Drop any existing table first. */
  recreate?: boolean;
}

export interface VectorStore {
  initialize(options?: VectorStoreInit): Promise<void>;
  /** Replaces every chunk of the sources present in `chunks`. */
  upsertChunks(chunks: IndexChunk[]): Promise<void>;
  deleteBySourceId(sourceId: string): Promise<void>;
  count(): Promise<number>;
  /** Builds search indexes once enough rows exist; a no-op otherwise. */
  ensureIndex(): Promise<void>;
}
