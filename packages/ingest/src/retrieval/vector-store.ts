import type { Connection, Table } from '@lancedb/lancedb';
import type { IndexChunk } from '@notion-rag/shared';
import { IngestError } from '../errors.js';
import { logEvent } from '../logger.js';
import type { VectorStore, VectorStoreInit } from './interfaces.js';

export interface LanceDBConfig {
  dbPath: string;
  tableName?: string;
}

// In-memory store for tests and dry runs
export class MockVectorStore implements VectorStore {
  private chunks: Map<string, IndexChunk> = new Map();

  async initialize(options: VectorStoreInit = {}): Promise<void> {
    if (options.recreate) this.chunks.clear();
  }

  async upsertChunks(chunks: IndexChunk[]): Promise<void> {
    for (const sourceId of new Set(chunks.map(c => c.sourceId))) {
      await this.deleteBySourceId(sourceId);
    }
    const nowIso = new Date().toISOString();
    for (const chunk of chunks) {
      this.chunks.set(chunk.id, { ...chunk, indexedAt: nowIso });
    }
  }

  async deleteBySourceId(sourceId: string): Promise<void> {
    for (const [id, chunk] of this.chunks.entries()) {
      if (chunk.sourceId === sourceId) this.chunks.delete(id);
    }
  }

  async count(): Promise<number> {
    return this.chunks.size;
  }

  async ensureIndex(): Promise<void> {
    // nothing to build in memory
  }

  all(): IndexChunk[] {
    return [...this.chunks.values()];
  }
}

// Row layout of the LanceDB table; property bags stay JSON text so differing tags per record survive
type LanceRow = {
  id: string;
  source_id: string;
  title: string;
  text: string;
  url: string;
  ancestry: string;
  properties: string;
  vector: number[];
  indexed_at: string;
};

const VECTOR_INDEX_MIN_ROWS = 256;

export class LanceDBVectorStore implements VectorStore {
  private db: Connection | undefined;
  private table: Table | undefined;
  private readonly tableName: string;

  constructor(private readonly config: LanceDBConfig) {
    this.tableName = config.tableName || 'records';
  }

  async initialize(options: VectorStoreInit = {}): Promise<void> {
    try {
      const lancedb = await import('@lancedb/lancedb');
      this.db = await lancedb.connect(this.config.dbPath);
      const names = await this.db.tableNames();
      if (names.includes(this.tableName)) {
        if (options.recreate) {
          await this.db.dropTable(this.tableName);
          logEvent('info', 'lancedb.table.dropped', { table: this.tableName, dbPath: this.config.dbPath });
        } else {
          this.table = await this.db.openTable(this.tableName);
        }
      }
      logEvent('info', 'lancedb.ready', { dbPath: this.config.dbPath, table: this.tableName, existing: this.table !== undefined });
    } catch (error) {
      throw new IngestError(
        `LanceDB initialization failed: ${error instanceof Error ? error.message : String(error)}`,
        'VECTOR_STORE_FAILED',
        { dbPath: this.config.dbPath }
      );
    }
  }

  async upsertChunks(chunks: IndexChunk[]): Promise<void> {
    if (chunks.length === 0) return;
    const db = this.db;
    if (!db) throw new IngestError('LanceDB store used before initialize()', 'VECTOR_STORE_FAILED');

    const nowIso = new Date().toISOString();
    const rows: LanceRow[] = chunks.map(chunk => ({
      id: chunk.id,
      source_id: chunk.sourceId,
      title: chunk.title,
      text: chunk.text,
      url: chunk.url,
      ancestry: chunk.ancestry,
      properties: chunk.properties,
      vector: chunk.vector ?? [],
      indexed_at: nowIso
    }));

    try {
      if (!this.table) {
        this.table = await db.createTable(this.tableName, rows);
        logEvent('info', 'lancedb.table.created', { table: this.tableName, rows: rows.length });
        return;
      }
      for (const sourceId of new Set(chunks.map(c => c.sourceId))) {
        await this.deleteBySourceId(sourceId);
      }
      await this.table.add(rows);
      logEvent('debug', 'lancedb.rows.added', { table: this.tableName, rows: rows.length });
    } catch (error) {
      throw new IngestError(
        `LanceDB upsert failed: ${error instanceof Error ? error.message : String(error)}`,
        'VECTOR_STORE_FAILED'
      );
    }
  }

  async deleteBySourceId(sourceId: string): Promise<void> {
    if (!this.table) return;
    await this.table.delete(`source_id = '${escapeSql(sourceId)}'`);
  }

  async count(): Promise<number> {
    return this.table ? this.table.countRows() : 0;
  }

  // ANN index training needs a minimum number of rows; smaller tables are scanned
  async ensureIndex(): Promise<void> {
    if (!this.table) return;
    const rows = await this.table.countRows();
    if (rows < VECTOR_INDEX_MIN_ROWS) return;
    try {
      await this.table.createIndex('vector');
      logEvent('info', 'lancedb.index.created', { table: this.tableName, rows });
    } catch (err) {
      // Searching still works without the index
      logEvent('warn', 'lancedb.index.skipped', { table: this.tableName, error: err instanceof Error ? err.message : String(err) });
    }
  }
}

function escapeSql(value: string): string {
  return value.replace(/'/g, "''");
}
