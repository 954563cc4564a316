import type { IndexChunk } from '@notion-rag/shared';
import { IngestError, PrerequisiteMissingError } from '../errors.js';
import { logEvent } from '../logger.js';
import { readParsedRecords } from '../parsing/flatten.js';
import type { SimpleChunker } from './chunker.js';
import type { Embedder, VectorStore } from './interfaces.js';

export interface IndexerDeps {
  dataDir: string;
  embedder: Embedder;
  store: VectorStore;
  chunker: SimpleChunker;
  batchSize: number;
}

export interface IndexOptions {
  recreate?: boolean;
}

export interface IndexResult {
  records: number;
  chunks: number;
  total: number; // rows in the store afterwards
}

/** Embeds the parsed records of one entity and writes them to its vector store. */
export class Indexer {
  constructor(private readonly deps: IndexerDeps) {}

  async index(rootId: string, options: IndexOptions = {}): Promise<IndexResult> {
    const { dataDir, embedder, store, chunker } = this.deps;
    const records = await readParsedRecords(dataDir, rootId);
    if (!records) {
      throw new PrerequisiteMissingError(`No parsed records for ${rootId}; run parse first`, { rootId });
    }

    await store.initialize({ recreate: options.recreate });
    const chunks = records.flatMap(r => chunker.chunkRecord(r));
    const batchSize = Math.max(1, this.deps.batchSize);

    // Chunks of one source stay in one upsert so replacing a source never drops its other chunks
    for (const batch of batchesBySource(chunks, batchSize)) {
      const vectors = await embedder.embed(batch.map(c => c.text));
      if (vectors.length !== batch.length) {
        throw new IngestError(`Embedder returned ${vectors.length} vectors for ${batch.length} chunks`, 'EMBEDDING_FAILED');
      }
      await store.upsertChunks(batch.map((chunk, i) => ({ ...chunk, vector: vectors[i] })));
      logEvent('debug', 'index.batch', { rootId, chunks: batch.length });
    }

    await store.ensureIndex();
    const total = await store.count();
    logEvent('info', 'index.done', { rootId, records: records.length, chunks: chunks.length, total });
    return { records: records.length, chunks: chunks.length, total };
  }
}

// Groups consecutive chunks into batches of about `size`, never splitting one source across batches
export function batchesBySource(chunks: IndexChunk[], size: number): IndexChunk[][] {
  const batches: IndexChunk[][] = [];
  let current: IndexChunk[] = [];
  let i = 0;
  while (i < chunks.length) {
    const sourceId = chunks[i].sourceId;
    let j = i;
    while (j < chunks.length && chunks[j].sourceId === sourceId) j++;
    const group = chunks.slice(i, j);
    if (current.length > 0 && current.length + group.length > size) {
      batches.push(current);
      current = [];
    }
    current.push(...group);
    i = j;
  }
  if (current.length > 0) batches.push(current);
  return batches;
}
