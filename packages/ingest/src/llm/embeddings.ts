import { IngestError } from '../errors.js';
import { systemClock, type Clock } from '../ingest/utils.js';
import { logEvent } from '../logger.js';
import type { Embedder } from '../retrieval/interfaces.js';
import { getArray, isRecord } from '../validation.js';

export interface EmbedOptions {
  baseUrl: string;
  model: string;
  timeoutMs?: number; // default 15000
  maxRetries?: number; // default 3
  backoffBaseMs?: number; // default 250
  clock?: Clock;
}

export class EmbeddingError extends IngestError {
  constructor(message: string, public readonly status?: number) {
    super(message, 'EMBEDDING_FAILED', { status });
  }
}

/**
 * Calls an OpenAI-compatible `/v1/embeddings` endpoint, retrying 429 and 5xx
 * with exponential backoff (Retry-After wins when longer).
 */
export async function embed(texts: string[], opts: EmbedOptions): Promise<number[][]> {
  if (texts.length === 0) return [];

  const timeoutMs = opts.timeoutMs ?? 15000;
  const maxRetries = Math.max(0, opts.maxRetries ?? 3);
  const baseDelay = Math.max(0, opts.backoffBaseMs ?? 250);
  const clock = opts.clock ?? systemClock;

  let attempt = 0;
  for (;;) {
    const res = await post(texts, opts, timeoutMs);
    if (res.ok) return res.vectors;

    const isRetryable = res.status === 429 || (res.status >= 500 && res.status < 600);
    if (isRetryable && attempt < maxRetries) {
      const ra = Number(res.retryAfter);
      const raMs = Number.isFinite(ra) ? ra * 1000 : 0;
      const delay = Math.max(raMs, baseDelay * Math.pow(2, attempt));
      logEvent('warn', 'embeddings.retry', { attempt: attempt + 1, maxRetries, status: res.status, delayMs: delay });
      attempt++;
      await clock.sleep(delay);
      continue;
    }
    throw new EmbeddingError(`embeddings HTTP ${res.status}: ${res.text}`, res.status);
  }
}

type PostResult =
  | { ok: true; vectors: number[][] }
  | { ok: false; status: number; retryAfter: string | null; text: string };

// One request; the timeout covers reading the body as well as the headers
async function post(texts: string[], opts: EmbedOptions, timeoutMs: number): Promise<PostResult> {
  const controller = new AbortController();
  const t = setTimeout(() => controller.abort(), timeoutMs);
  try {
    const res = await fetch(`${opts.baseUrl}/v1/embeddings`, {
      method: 'POST',
      headers: { 'content-type': 'application/json' },
      body: JSON.stringify({ model: opts.model, input: texts }),
      signal: controller.signal
    });
    if (!res.ok) {
      return { ok: false, status: res.status, retryAfter: res.headers.get('retry-after'), text: await res.text() };
    }
    const data: unknown = await res.json();
    return { ok: true, vectors: vectorsOf(data, texts.length) };
  } finally {
    clearTimeout(t);
  }
}

function vectorsOf(data: unknown, expected: number): number[][] {
  const items = isRecord(data) ? getArray(data, 'data') : [];
  const vectors: number[][] = [];
  for (const item of items) {
    const embedding = isRecord(item) ? item.embedding : undefined;
    if (Array.isArray(embedding) && embedding.every(v => typeof v === 'number')) vectors.push(embedding);
  }
  if (vectors.length !== expected) {
    throw new EmbeddingError(`embeddings response has ${vectors.length} vectors for ${expected} inputs`);
  }
  return vectors;
}

/** Normalize vectors to unit length for stable cosine similarity across models. */
export function normalizeVectors(vectors: number[][]): number[][] {
  return vectors.map(vec => {
    let norm = 0;
    for (const v of vec) norm += v * v;
    norm = Math.sqrt(norm);
    if (!isFinite(norm) || norm === 0) return vec;
    return vec.map(v => v / norm);
  });
}

export interface HttpEmbedderConfig extends EmbedOptions {
  normalize?: boolean;
}

export class HttpEmbedder implements Embedder {
  constructor(private readonly config: HttpEmbedderConfig) {}

  async embed(batch: string[]): Promise<number[][]> {
    const raw = await embed(batch, this.config);
    return this.config.normalize ? normalizeVectors(raw) : raw;
  }
}
