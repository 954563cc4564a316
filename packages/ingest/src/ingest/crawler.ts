import fs from 'node:fs/promises';
import type { NodeRef, NodeStatus, PullSummary, RunStatus } from '@notion-rag/shared';
import { CorruptStateError, FetchError, describeError, isAbortError } from '../errors.js';
import { logEvent } from '../logger.js';
import type { ContentSource } from '../sources/interfaces.js';
import type { AttachmentDownloader } from './attachments.js';
import type { RawRecordWriter } from './record-writer.js';
import { PullState, type PullStateStore } from './state.js';

/**
 * resume: visit every pending or failed node.
 * retry_failed: visit only nodes whose own fetch failed, plus whatever they discover.
 */
export type CrawlMode = 'resume' | 'retry_failed';

export interface CrawlOptions {
  mode?: CrawlMode;
  concurrency: number;
  checkpointEvery?: number; // node transitions per state save
  signal?: AbortSignal;
}

export interface PullOptions extends Omit<CrawlOptions, 'mode'> {
  reset?: boolean;
  retryFailed?: boolean;
}

export interface CrawlResult {
  ok: boolean; // root reached success
  rootStatus: NodeStatus;
  runStatus: RunStatus;
  interrupted: boolean;
  fetched: string[]; // ids handed to the source in this run
  summary: PullSummary;
}

export interface TreeCrawlerDeps {
  source: ContentSource;
  store: PullStateStore;
  writer: RawRecordWriter;
  attachments?: AttachmentDownloader;
}

/** Serialises state saves and batches them every `every` transitions. */
class Checkpointer {
  private transitions = 0;
  private chain: Promise<void> = Promise.resolve();

  constructor(private readonly store: PullStateStore, private readonly state: PullState, private readonly every: number) {}

  async transition(): Promise<void> {
    this.transitions++;
    if (this.transitions >= this.every) await this.flush();
  }

  flush(): Promise<void> {
    this.transitions = 0;
    const run = this.chain.then(() => this.store.save(this.state));
    // Keep the chain usable after a failed save; the failure still reaches the caller through `run`
    this.chain = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }
}

/**
 * Walks the content tree with a pool of workers sharing one queue.
 *
 * Queue and state mutations only happen in synchronous stretches between
 * awaits, so no two workers interleave inside them; remote I/O runs outside.
 * Ids are deduplicated globally: a node reachable from several parents is
 * fetched once and settles every parent's pending-children counter.
 */
export class TreeCrawler {
  constructor(private readonly deps: TreeCrawlerDeps) {}

  /** Loads (or resets) the entity's state and crawls it to a fixed point. */
  async pull(root: NodeRef, options: PullOptions): Promise<CrawlResult> {
    const { store, writer } = this.deps;
    if (options.reset) {
      await store.reset();
      await fs.rm(writer.rawDir(root.id), { recursive: true, force: true });
      logEvent('info', 'pull.reset', { rootId: root.id });
    }
    const loaded = await store.load();
    if (loaded && loaded.rootId !== root.id) {
      throw new CorruptStateError(store.filePath, `belongs to root ${loaded.rootId}, not ${root.id}`);
    }
    const state = loaded ?? PullState.create(root);
    return this.crawl(state, { ...options, mode: options.retryFailed ? 'retry_failed' : 'resume' });
  }

  async crawl(state: PullState, options: CrawlOptions): Promise<CrawlResult> {
    const { source, store, writer, attachments } = this.deps;
    const mode = options.mode ?? 'resume';
    const checkpoint = new Checkpointer(store, state, Math.max(1, options.checkpointEvery ?? 1));
    const stop = new AbortController();
    const onExternalAbort = () => stop.abort();
    options.signal?.addEventListener('abort', onExternalAbort, { once: true });
    if (options.signal?.aborted) stop.abort();

    const queue: string[] = [];
    const queued = new Set<string>();
    const fetched: string[] = [];
    let inFlight = 0;
    let abandoned = 0;
    let fatal: unknown;
    let waiters: Array<() => void> = [];

    const notify = () => {
      const ready = waiters;
      waiters = [];
      for (const wake of ready) wake();
    };
    stop.signal.addEventListener('abort', notify, { once: true });

    const enqueue = (id: string) => {
      if (queued.has(id)) return;
      queued.add(id);
      queue.push(id);
      notify();
    };

    const seeds = mode === 'retry_failed' ? state.selectFailed() : state.selectResumable();
    state.reopen(seeds);
    seeds.forEach(enqueue);
    state.setRunStatus('running');

    logEvent('info', 'pull.start', {
      rootId: state.rootId,
      source: source.getName(),
      mode,
      seeds: seeds.length,
      concurrency: options.concurrency
    });

    const visit = async (id: string) => {
      const node = state.get(id);
      if (!node || node.status !== 'pending') return;
      state.mark(id, { status: 'in_progress' });
      inFlight++;
      fetched.push(id);
      try {
        const remote = await source.retrieve({ id, nodeType: node.nodeType, signal: stop.signal });
        const rawPath = await writer.write(state.rootId, remote);
        if (attachments) await attachments.download(state.rootId, remote, stop.signal);
        const result = state.mark(id, { status: 'success', children: remote.children, rawPath });
        result.enqueue.forEach(enqueue);
        logEvent('debug', 'pull.node.fetched', { id, nodeType: node.nodeType, children: remote.children.length });
        for (const settledId of result.settled) {
          if (settledId !== id) logEvent('debug', 'pull.node.settled', { id: settledId, status: state.get(settledId)?.status });
        }
      } catch (err) {
        if (isAbortError(err) && stop.signal.aborted) {
          // Cancelled before or between requests: nothing of this node was kept
          state.mark(id, { status: 'pending' });
          abandoned++;
        } else {
          const errorKind = err instanceof FetchError ? err.kind : 'error';
          state.mark(id, { status: 'failed', error: describeError(err), errorKind });
          logEvent('warn', 'pull.node.failed', { id, nodeType: node.nodeType, errorKind, error: describeError(err) });
        }
      } finally {
        inFlight--;
      }
      await checkpoint.transition();
    };

    const worker = async () => {
      for (;;) {
        if (stop.signal.aborted) return;
        const id = queue.shift();
        if (id === undefined) {
          if (inFlight === 0) {
            notify();
            return;
          }
          await new Promise<void>(resolve => waiters.push(resolve));
          continue;
        }
        queued.delete(id);
        try {
          await visit(id);
        } catch (err) {
          // Only state persistence lands here; stop the run and report it
          fatal = fatal ?? err;
          stop.abort();
        }
        notify();
      }
    };

    const workers = Array.from({ length: Math.max(1, options.concurrency) }, () => worker());
    await Promise.all(workers);
    options.signal?.removeEventListener('abort', onExternalAbort);

    // An abort that lands after the last node settled leaves nothing undone
    const interrupted = options.signal?.aborted === true && (queue.length > 0 || abandoned > 0);
    const rootStatus = state.rootStatus;
    let runStatus: RunStatus;
    if (interrupted || fatal !== undefined) runStatus = 'interrupted';
    else if (rootStatus === 'success') runStatus = 'completed';
    else if (rootStatus === 'partial' || rootStatus === 'failed') runStatus = 'completed_with_failures';
    else runStatus = 'incomplete';
    state.setRunStatus(runStatus);

    if (fatal !== undefined) throw fatal;
    await checkpoint.flush();

    const summary = state.summary();
    logEvent(runStatus === 'completed' ? 'info' : 'warn', 'pull.done', {
      rootId: state.rootId,
      runStatus,
      rootStatus,
      fetched: fetched.length,
      counts: summary.counts,
      failed: summary.failed.map(f => f.id)
    });

    return { ok: rootStatus === 'success', rootStatus, runStatus, interrupted, fetched, summary };
  }
}
