import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import type { NodeRef, NodeType, PullSummary } from '@notion-rag/shared';
import { FetchError } from '../errors.js';
import type { CrawlResult } from '../ingest/crawler.js';
import { abortError, type Clock } from '../ingest/utils.js';
import { setLogSink, type LogSink } from '../logger.js';
import type { Pipeline } from '../pipeline.js';
import type { ContentSource, RemoteNode, RetrieveRequest } from '../sources/interfaces.js';

/** Virtual time: sleeping records the wait and moves the clock forward at once. */
export class ManualClock implements Clock {
  readonly sleeps: number[] = [];
  private t = 0;

  now(): number {
    return this.t;
  }

  async sleep(ms: number, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) throw abortError();
    this.sleeps.push(ms);
    this.t += ms;
  }
}

export function page(id: string): NodeRef {
  return { id, nodeType: 'page' };
}

export function ref(id: string, nodeType: NodeType): NodeRef {
  return { id, nodeType };
}

/**
 * In-memory content tree. `fail` makes a node's fetch throw a FetchError the
 * given number of times (Infinity: always); `onRetrieve` runs before each
 * fetch returns; `content` replaces a node's default payload.
 */
export class FakeSource implements ContentSource {
  readonly calls: string[] = [];
  readonly fail = new Map<string, number>();
  readonly content = new Map<string, unknown>();
  onRetrieve?: (id: string) => void;

  constructor(readonly tree: Record<string, NodeRef[]>) {}

  getName(): string {
    return 'fake';
  }

  async retrieve({ id, nodeType, signal }: RetrieveRequest): Promise<RemoteNode> {
    if (signal?.aborted) throw abortError();
    this.calls.push(id);
    await Promise.resolve();
    this.onRetrieve?.(id);
    const remaining = this.fail.get(id) ?? 0;
    if (remaining > 0) {
      this.fail.set(id, remaining - 1);
      throw new FetchError('transport', `boom ${id}`, 503, 4);
    }
    return { id, nodeType, children: this.tree[id] ?? [], content: this.content.get(id) ?? { id, nodeType } };
  }
}

export async function makeTempDir(prefix = 'notion-rag-test-'): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function removeDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

/** Collects log lines instead of printing them; call the result to restore the previous sink. */
export function captureLogs(): { lines: string[]; restore: () => void } {
  const lines: string[] = [];
  const previous: LogSink = setLogSink(line => {
    lines.push(line);
  });
  return { lines, restore: () => setLogSink(previous) };
}

export function pullSummary(overrides: Partial<PullSummary> = {}): PullSummary {
  return {
    rootId: 'root',
    rootStatus: 'success',
    runStatus: 'completed',
    counts: { pending: 0, in_progress: 0, success: 1, partial: 0, failed: 0 },
    failed: [],
    ...overrides
  };
}

export function crawlResult(summary: PullSummary, extra: Partial<CrawlResult> = {}): CrawlResult {
  return {
    ok: summary.rootStatus === 'success',
    rootStatus: summary.rootStatus,
    runStatus: summary.runStatus,
    interrupted: false,
    fetched: [],
    summary,
    ...extra
  };
}

/** Pipeline whose stages fail unless a test provides them; status reports no state. */
export function fakePipeline(overrides: Partial<Pipeline> = {}): Pipeline {
  const unexpected = (stage: string) => async (): Promise<never> => {
    throw new Error(`unexpected call to ${stage}`);
  };
  return {
    pull: unexpected('pull'),
    parse: unexpected('parse'),
    index: unexpected('index'),
    status: async () => undefined,
    ...overrides
  };
}
