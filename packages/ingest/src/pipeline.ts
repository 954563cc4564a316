import type { NodeType, PullSummary } from '@notion-rag/shared';
import { AttachmentDownloader, createFileFetcher, type FileFetcher } from './ingest/attachments.js';
import { requireNotionToken, type IngestConfig } from './ingest/config-store.js';
import { TreeCrawler, type CrawlResult } from './ingest/crawler.js';
import { entityPaths } from './ingest/paths.js';
import { createFetchTransport, RateLimitedClient } from './ingest/rate-limited-client.js';
import { RawRecordWriter } from './ingest/record-writer.js';
import { PullStateStore } from './ingest/state.js';
import { HttpEmbedder } from './llm/embeddings.js';
import { FlattenStage, type FlattenResult } from './parsing/flatten.js';
import { SimpleChunker } from './retrieval/chunker.js';
import { Indexer, type IndexResult } from './retrieval/indexer.js';
import type { Embedder, VectorStore } from './retrieval/interfaces.js';
import { LanceDBVectorStore } from './retrieval/vector-store.js';
import type { ContentSource } from './sources/interfaces.js';
import { NotionSource, normalizeNotionId, notionHeaders } from './sources/notion.js';

export interface PullRequestOptions {
  rootType?: NodeType; // used when no state exists yet; default page
  reset?: boolean;
  retryFailed?: boolean;
  signal?: AbortSignal;
}

export interface ParseRequestOptions {
  partial?: boolean;
}

export interface IndexRequestOptions {
  recreate?: boolean;
}

/** The three stages plus status, bound to one configuration. */
export interface Pipeline {
  pull(rootId: string, options?: PullRequestOptions): Promise<CrawlResult>;
  parse(rootId: string, options?: ParseRequestOptions): Promise<FlattenResult>;
  index(rootId: string, options?: IndexRequestOptions): Promise<IndexResult>;
  status(rootId: string): Promise<PullSummary | undefined>;
}

export interface PipelineDeps {
  source: ContentSource;
  embedder: Embedder;
  vectorStore(rootId: string): VectorStore;
  fetchFile: FileFetcher;
}

export function createNotionSource(config: IngestConfig): NotionSource {
  const transport = createFetchTransport({
    baseUrl: config.notionBaseUrl,
    headers: notionHeaders({ baseUrl: config.notionBaseUrl, token: requireNotionToken(config), version: config.notionVersion }),
    timeoutMs: config.requestTimeout * 1000
  });
  const client = new RateLimitedClient(transport, {
    maxConcurrent: config.maxConcurrent,
    apiDelayMs: config.apiDelay * 1000,
    retry: {
      maxRetries: config.maxRetries,
      baseDelayMs: config.retryBaseDelay * 1000,
      backoffFactor: config.backoffFactor
    }
  });
  return new NotionSource(client);
}

/**
 * Wires the stages from configuration. Collaborators not given in `overrides`
 * are built on first use, so status and parse never need a Notion token.
 */
export function createPipeline(config: IngestConfig, overrides: Partial<PipelineDeps> = {}): Pipeline {
  let source = overrides.source;
  const embedder =
    overrides.embedder ??
    new HttpEmbedder({
      baseUrl: config.llmBaseUrl,
      model: config.llmEmbedModel,
      timeoutMs: config.requestTimeout * 1000,
      normalize: config.normalizeEmbeddings
    });
  const vectorStore =
    overrides.vectorStore ??
    ((rootId: string) => new LanceDBVectorStore({ dbPath: entityPaths(config.dataDir, rootId).indexDir, tableName: 'records' }));
  const writer = new RawRecordWriter(config.dataDir);
  const attachments = config.downloadAttachments
    ? new AttachmentDownloader(config.dataDir, overrides.fetchFile ?? createFileFetcher(config.requestTimeout * 1000))
    : undefined;

  const stateStore = (rootId: string) => new PullStateStore(entityPaths(config.dataDir, rootId).stateFile);

  return {
    async pull(rawRootId, options = {}) {
      const rootId = normalizeNotionId(rawRootId);
      const active = (source ??= createNotionSource(config));
      const crawler = new TreeCrawler({ source: active, store: stateStore(rootId), writer, attachments });
      return crawler.pull(
        { id: rootId, nodeType: options.rootType ?? 'page' },
        {
          reset: options.reset,
          retryFailed: options.retryFailed,
          concurrency: config.maxConcurrent,
          checkpointEvery: config.checkpointEvery,
          signal: options.signal
        }
      );
    },

    async parse(rawRootId, options = {}) {
      return new FlattenStage(config.dataDir).flatten(normalizeNotionId(rawRootId), { allowPartial: options.partial });
    },

    async index(rawRootId, options = {}) {
      const rootId = normalizeNotionId(rawRootId);
      const indexer = new Indexer({
        dataDir: config.dataDir,
        embedder,
        store: vectorStore(rootId),
        chunker: new SimpleChunker(),
        batchSize: config.embedBatchSize
      });
      return indexer.index(rootId, { recreate: options.recreate });
    },

    async status(rawRootId) {
      const state = await stateStore(normalizeNotionId(rawRootId)).load();
      return state?.summary();
    }
  };
}
